import { z } from "zod";
import {
  DEFAULT_DEBUG_FILENAME,
  DEFAULT_JSON_FILENAME,
  PRIMARY_FETCH_TIMEOUT_MS,
  SECONDARY_FETCH_TIMEOUT_MS,
} from "./constants.js";
import { ConfigError } from "./errors.js";

const EnvSchema = z.object({
  PROFILER_PRIMARY_TIMEOUT_MS: z.coerce.number().int().positive().default(PRIMARY_FETCH_TIMEOUT_MS),
  PROFILER_SECONDARY_TIMEOUT_MS: z.coerce.number().int().positive().default(SECONDARY_FETCH_TIMEOUT_MS),
  PROFILER_OUTPUT_FILE: z.string().min(1).default(DEFAULT_JSON_FILENAME),
  PROFILER_DEBUG_FILE: z.string().min(1).default(DEFAULT_DEBUG_FILENAME),
  PROFILER_USER_AGENT: z.string().min(1).optional(),
});

// `NAME=` in a .env file means "not set", not an empty value.
function dropEmptyValues(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
}

export interface ProfilerConfig {
  primaryTimeoutMs: number;
  secondaryTimeoutMs: number;
  outputFile: string;
  debugFile: string;
  /** Replaces the default browser User-Agent when set. */
  userAgent?: string;
}

/**
 * Reads profiler settings from environment variables, falling back to the built-in defaults.
 * @throws {ConfigError} If a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProfilerConfig {
  const result = EnvSchema.safeParse(dropEmptyValues(env));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${z.prettifyError(result.error)}`);
  }

  const parsed = result.data;
  return {
    primaryTimeoutMs: parsed.PROFILER_PRIMARY_TIMEOUT_MS,
    secondaryTimeoutMs: parsed.PROFILER_SECONDARY_TIMEOUT_MS,
    outputFile: parsed.PROFILER_OUTPUT_FILE,
    debugFile: parsed.PROFILER_DEBUG_FILE,
    userAgent: parsed.PROFILER_USER_AGENT,
  };
}
