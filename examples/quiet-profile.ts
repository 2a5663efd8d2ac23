import { CompanyProfiler, PageFetcher, serializeProfile } from "../src/index.js";

/**
 * Quiet Profiling with Custom Headers
 *
 * Silences progress output and prints only the JSON record.
 */

const silent = {
  log: () => {},
  warn: () => {},
  error: (...args: unknown[]) => console.error(...args),
};

async function main() {
  const profiler = new CompanyProfiler({
    logger: silent,
    fetcher: new PageFetcher({ headers: { "Accept-Language": "en-GB,en;q=0.8" } }),
    secondaryTimeoutMs: 5000,
  });

  const profile = await profiler.scrape(process.argv[2] ?? "https://example.org/");
  process.stdout.write(serializeProfile(profile));
}

main().catch(console.error);
