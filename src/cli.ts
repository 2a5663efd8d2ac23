#!/usr/bin/env node
import { config } from "dotenv";
import { createProgram } from "./command.js";
import { describeError } from "./errors.js";

config();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`[!] ${describeError(error)}`);
    process.exitCode = 1;
  });
