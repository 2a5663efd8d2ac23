import { describe, it, expect, vi, afterAll } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CompanyProfiler, scrapeCompanyProfile } from "../src/CompanyProfiler.js";
import { PageFetchHttpError } from "../src/PageFetcher.js";
import { FetchError } from "../src/errors.js";
import { createEmptyProfile } from "../src/profile.js";
import { serializeProfile } from "../src/reporters/json-report.js";
import { FakeFetcher } from "./support/FakeFetcher.js";

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}

const HOME_URL = "https://acme.test";
const FINAL_URL = "https://www.acme.test/";
const ABOUT_URL = "https://www.acme.test/about";
const BLOG_URL = "https://www.acme.test/blog/";

function siteFetcher(overrides: Record<string, string | Error> = {}): FakeFetcher {
  return new FakeFetcher(
    {
      [HOME_URL]: fixture("home.html"),
      [ABOUT_URL]: fixture("about.html"),
      [BLOG_URL]: fixture("blog.html"),
      ...overrides,
    },
    { [HOME_URL]: FINAL_URL }
  );
}

function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function collectingWriter() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

const ABOUT_DESCRIPTION =
  "Acme was founded in 2009 to help mid-sized firms move their workloads to the cloud. " +
  "Our engineers have delivered more than two hundred migrations for retail and finance.";

describe("CompanyProfiler", () => {
  const tempDirs: string[] = [];

  afterAll(async () => {
    await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("builds a full profile from the home, about and blog pages", async () => {
    const profiler = new CompanyProfiler({ fetcher: siteFetcher(), logger: silentLogger() });
    const profile = await profiler.scrape(HOME_URL);

    expect(profile).toEqual({
      companyName: "Acme",
      website: HOME_URL,
      about: { description: ABOUT_DESCRIPTION, pageUrl: ABOUT_URL },
      services: ["Cloud Consulting", "Data Engineering", "round-the-clock monitoring for critical systems"],
      clients: ["Globex", "Initech"],
      process: [
        { step: 1, description: "Discovery call" },
        { step: 2, description: "Solution design" },
        { step: 3, description: "Delivery and support" },
      ],
      articles: [
        { title: "Cutting cloud costs in 2024", url: null },
        { title: "Data mesh without the hype", url: "https://www.acme.test/blog/data-mesh" },
        { title: "Team news", url: null },
      ],
      contact: {
        contactPage: "https://www.acme.test/contact",
        email: "sales@acme.test",
        phone: "555-123-4567",
      },
      careers: { pageUrl: "https://www.acme.test/careers" },
      policies: {
        privacyPolicy: "https://www.acme.test/privacy-policy",
        returnsPolicy: "https://www.acme.test/returns",
        termsOfService: "https://www.acme.test/terms",
      },
    });
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it("fetches the home, about and blog pages in order with their timeouts", async () => {
    const fetcher = siteFetcher();
    await new CompanyProfiler({ fetcher, logger: silentLogger(), primaryTimeoutMs: 3000, secondaryTimeoutMs: 1000 }).scrape(
      HOME_URL
    );
    expect(fetcher.requests).toEqual([
      { url: HOME_URL, timeoutMs: 3000 },
      { url: ABOUT_URL, timeoutMs: 1000 },
      { url: BLOG_URL, timeoutMs: 1000 },
    ]);
  });

  it("uses the default timeouts", async () => {
    const fetcher = siteFetcher();
    await new CompanyProfiler({ fetcher, logger: silentLogger() }).scrape(HOME_URL);
    expect(fetcher.requests.map((request) => request.timeoutMs)).toEqual([15000, 10000, 10000]);
  });

  it("returns the empty profile when the home page fails", async () => {
    const logger = silentLogger();
    const fetcher = siteFetcher({ [HOME_URL]: new PageFetchHttpError("HTTP error! status: 503", 503, HOME_URL) });

    const profile = await new CompanyProfiler({ fetcher, logger }).scrape(HOME_URL);

    expect(profile).toEqual(createEmptyProfile(HOME_URL));
    expect(fetcher.requests).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith("[!] Failed to fetch website: HTTP error! status: 503");
  });

  it("returns the empty profile when the home page times out", async () => {
    const timeout = new FetchError("Request timed out after 15000ms", "ERR_FETCH_TIMEOUT", { url: HOME_URL });
    const profile = await new CompanyProfiler({ fetcher: siteFetcher({ [HOME_URL]: timeout }), logger: silentLogger() }).scrape(
      HOME_URL
    );
    expect(profile).toEqual(createEmptyProfile(HOME_URL));
  });

  it("keeps going when the about and blog pages fail", async () => {
    const logger = silentLogger();
    const fetcher = new FakeFetcher({ [HOME_URL]: fixture("home.html") }, { [HOME_URL]: FINAL_URL });

    const profile = await new CompanyProfiler({ fetcher, logger }).scrape(HOME_URL);

    expect(profile.about).toEqual({ description: null, pageUrl: ABOUT_URL });
    expect(profile.articles).toEqual([]);
    expect(profile.companyName).toBe("Acme");
    expect(logger.warn).toHaveBeenCalledWith("[!] Could not scrape About Us page: HTTP error! status: 404");
    expect(logger.warn).toHaveBeenCalledWith("[!] Could not scrape blog: HTTP error! status: 404");
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("makes a single request when the page links nowhere", async () => {
    const fetcher = new FakeFetcher({ "https://plain.test/": "<html><head><title>Plain</title></head><body></body></html>" });
    const profile = await new CompanyProfiler({ fetcher, logger: silentLogger() }).scrape("https://plain.test/");
    expect(fetcher.requests).toHaveLength(1);
    expect(profile.companyName).toBe("Plain");
    expect(profile.about.pageUrl).toBeNull();
  });

  it("produces the same profile for the same pages", async () => {
    const first = await new CompanyProfiler({ fetcher: siteFetcher(), logger: silentLogger() }).scrape(HOME_URL);
    const second = await new CompanyProfiler({ fetcher: siteFetcher(), logger: silentLogger() }).scrape(HOME_URL);
    expect(serializeProfile(second)).toBe(serializeProfile(first));
  });

  it("writes debug artifacts only in debug mode", async () => {
    const dir = await mkdtemp(join(tmpdir(), "company-profile-"));
    tempDirs.push(dir);
    const debugFile = join(dir, "page_source.html");

    const quietWriter = collectingWriter();
    await new CompanyProfiler({ fetcher: siteFetcher(), logger: silentLogger(), writer: quietWriter }).scrape(HOME_URL);
    expect(quietWriter.chunks).toEqual([]);

    const writer = collectingWriter();
    const logger = silentLogger();
    await new CompanyProfiler({ fetcher: siteFetcher(), logger, writer, debug: true, debugFile }).scrape(HOME_URL);

    expect(writer.chunks).toHaveLength(1);
    expect(writer.chunks[0]).toContain("DEBUG: PAGE STRUCTURE ANALYSIS");
    expect(writer.chunks[0]).toContain("[DEBUG] Total links found: 10");
    const source = await readFile(debugFile, "utf-8");
    expect(source.split("\n")[0]).toBe('<html lang="en">');
    expect(logger.log).toHaveBeenCalledWith(`[+] HTML saved to ${debugFile} for inspection`);
  });
});

describe("scrapeCompanyProfile", () => {
  it("runs a one-off profiler", async () => {
    const profile = await scrapeCompanyProfile(HOME_URL, { fetcher: siteFetcher(), logger: silentLogger() });
    expect(profile.companyName).toBe("Acme");
    expect(profile.website).toBe(HOME_URL);
  });
});
