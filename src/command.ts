import { Command } from "commander";
import type { IPageFetcher } from "./IPageFetcher.js";
import type { Logger, OutputWriter } from "./types.js";
import { loadConfig } from "./config.js";
import { PageFetcher } from "./PageFetcher.js";
import { scrapeCompanyProfile } from "./CompanyProfiler.js";
import { printProfileReport } from "./reporters/text-report.js";
import { saveProfileJSON } from "./reporters/json-report.js";
import { describeError } from "./errors.js";

export interface ProfileCommandOptions {
  debug: boolean;
  output?: string;
  json: boolean;
}

/**
 * Collaborators the command uses. Each defaults to the real process resource.
 */
export interface CommandDependencies {
  /** Source of PROFILER_* settings. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Default: a PageFetcher honouring PROFILER_USER_AGENT */
  fetcher?: IPageFetcher;
  /** Default: console */
  logger?: Logger;
  /** Receives the text report. Default: process.stdout */
  writer?: OutputWriter;
}

/**
 * Profiles `url`, prints the report and writes the JSON file unless `options.json` is false.
 * @returns The process exit code: 0 on success, 1 on any error.
 */
export async function runProfileCommand(
  url: string,
  options: ProfileCommandOptions,
  deps: CommandDependencies = {}
): Promise<number> {
  const logger = deps.logger ?? console;
  const writer = deps.writer ?? process.stdout;

  try {
    const settings = loadConfig(deps.env);
    const fetcher =
      deps.fetcher ??
      new PageFetcher({
        headers: settings.userAgent ? { "User-Agent": settings.userAgent } : {},
      });

    const profile = await scrapeCompanyProfile(url, {
      debug: options.debug,
      debugFile: settings.debugFile,
      primaryTimeoutMs: settings.primaryTimeoutMs,
      secondaryTimeoutMs: settings.secondaryTimeoutMs,
      fetcher,
      logger,
      writer,
    });

    printProfileReport(profile, writer);

    if (options.json) {
      const filename = await saveProfileJSON(profile, options.output ?? settings.outputFile);
      logger.log(`\n[+] Profile saved to ${filename}`);
    }
    return 0;
  } catch (error: unknown) {
    logger.error(`\n[!] Error scraping ${url}: ${describeError(error)}`);
    if (error instanceof Error && error.stack) {
      logger.error(error.stack);
    }
    return 1;
  }
}

export function createProgram(deps: CommandDependencies = {}): Command {
  const program = new Command();

  program
    .name("company-profile")
    .description("Fetch a company website and extract a structured company profile")
    .version("1.0.0")
    .argument("<url>", "Company website to profile")
    .option("-d, --debug", "Save the parsed page source and print a page structure report", false)
    .option("-o, --output <path>", "JSON output file (default: PROFILER_OUTPUT_FILE or company_profile.json)")
    .option("--no-json", "Skip writing the JSON file")
    .action(async (url: string, options: ProfileCommandOptions) => {
      const exitCode = await runProfileCommand(url, options, deps);
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });

  return program;
}
