import type { HTMLElement } from "node-html-parser";
import type { IPageFetcher } from "./IPageFetcher.js";
import type { Article, CompanyProfile, Logger, OutputWriter } from "./types.js";
import { PageFetcher } from "./PageFetcher.js";
import { DEFAULT_DEBUG_FILENAME, PRIMARY_FETCH_TIMEOUT_MS, SECONDARY_FETCH_TIMEOUT_MS } from "./constants.js";
import { describeError } from "./errors.js";
import { assembleProfile, createEmptyProfile } from "./profile.js";
import { parseDocument } from "./utils/dom.js";
import { buildLinkCatalog } from "./utils/link-catalog.js";
import {
  extractAboutDescription,
  extractArticles,
  extractClients,
  extractCompanyName,
  extractContactDetails,
  extractNavigationLinks,
  extractProcess,
  extractServices,
  findBlogCandidates,
} from "./extractors/index.js";
import { formatStructureReport, savePageSource } from "./reporters/debug-report.js";

/**
 * Configuration options for the CompanyProfiler.
 */
export interface CompanyProfilerOptions {
  /** Write the parsed page to `debugFile` and print a structure report. Default: false */
  debug?: boolean;
  /** Where the debug page source goes. Default: page_source.html */
  debugFile?: string;
  /** Timeout for the requested page. Default: 15000 */
  primaryTimeoutMs?: number;
  /** Timeout for the about and blog pages. Default: 10000 */
  secondaryTimeoutMs?: number;
  /** Fetcher used for every request. Default: a PageFetcher with browser-like headers */
  fetcher?: IPageFetcher;
  /** Receives progress and failure messages. Default: console */
  logger?: Logger;
  /** Receives the debug structure report. Default: process.stdout */
  writer?: OutputWriter;
}

/**
 * Builds a company profile from a single website: the requested page, plus its
 * about page and first blog-like page when those are linked.
 */
export class CompanyProfiler {
  private readonly fetcher: IPageFetcher;
  private readonly logger: Logger;
  private readonly writer: OutputWriter;
  private readonly debug: boolean;
  private readonly debugFile: string;
  private readonly primaryTimeoutMs: number;
  private readonly secondaryTimeoutMs: number;

  constructor(options: CompanyProfilerOptions = {}) {
    this.fetcher = options.fetcher ?? new PageFetcher();
    this.logger = options.logger ?? console;
    this.writer = options.writer ?? process.stdout;
    this.debug = options.debug ?? false;
    this.debugFile = options.debugFile ?? DEFAULT_DEBUG_FILENAME;
    this.primaryTimeoutMs = options.primaryTimeoutMs ?? PRIMARY_FETCH_TIMEOUT_MS;
    this.secondaryTimeoutMs = options.secondaryTimeoutMs ?? SECONDARY_FETCH_TIMEOUT_MS;
  }

  /**
   * Scrapes `url` into a profile.
   *
   * Never rejects because of a failed request: if the requested page can't be
   * fetched the empty profile is returned, and failures on the about or blog page
   * only leave their fields empty.
   */
  async scrape(url: string): Promise<CompanyProfile> {
    this.logger.log(`[*] Fetching main page: ${url}`);

    let html: string;
    let finalUrl: string;
    try {
      const page = await this.fetcher.fetchPage(url, { timeoutMs: this.primaryTimeoutMs });
      html = page.html;
      finalUrl = page.url;
      this.logger.log(`[+] Status Code: ${page.statusCode}`);
      this.logger.log(`[+] Final URL: ${page.url}`);
      this.logger.log(`[+] Content Length: ${page.html.length} characters`);
    } catch (error: unknown) {
      this.logger.error(`[!] Failed to fetch website: ${describeError(error)}`);
      return createEmptyProfile(url);
    }

    const root = parseDocument(html);

    if (this.debug) {
      await this.writeDebugArtifacts(root);
    }

    const companyName = extractCompanyName(root);
    if (companyName) this.logger.log(`[+] Company name: ${companyName}`);

    const catalog = buildLinkCatalog(root, finalUrl);
    this.logger.log(`[+] Collected ${catalog.length} links`);

    const navigation = extractNavigationLinks(catalog);

    const services = extractServices(root);
    this.logger.log(`[+] Total services found: ${services.length}`);

    const clients = extractClients(root);
    this.logger.log(`[+] Total clients found: ${clients.length}`);

    const processSteps = extractProcess(root);
    this.logger.log(`[+] Total process steps found: ${processSteps.length}`);

    const { email, phone } = extractContactDetails(root);

    const aboutDescription = navigation.about ? await this.describeAboutPage(navigation.about) : null;

    const blogCandidates = findBlogCandidates(catalog);
    const articles = blogCandidates.length > 0 ? await this.collectArticles(blogCandidates[0]) : [];
    this.logger.log(`[+] Total articles found: ${articles.length}`);

    return assembleProfile(url, {
      companyName,
      aboutDescription,
      navigation,
      services,
      clients,
      process: processSteps,
      articles,
      email,
      phone,
    });
  }

  private async describeAboutPage(aboutUrl: string): Promise<string | null> {
    this.logger.log(`[*] Scraping About Us page: ${aboutUrl}`);
    const root = await this.fetchSecondary(aboutUrl, "About Us page");
    if (!root) return null;

    const description = extractAboutDescription(root);
    if (description) {
      this.logger.log(`[+] About Us description extracted (${description.length} chars)`);
    }
    return description;
  }

  private async collectArticles(blogUrl: string): Promise<Article[]> {
    this.logger.log(`[*] Scraping blog page: ${blogUrl}`);
    const root = await this.fetchSecondary(blogUrl, "blog");
    return root ? extractArticles(root, blogUrl) : [];
  }

  private async fetchSecondary(url: string, label: string): Promise<HTMLElement | null> {
    try {
      const page = await this.fetcher.fetchPage(url, { timeoutMs: this.secondaryTimeoutMs });
      return parseDocument(page.html);
    } catch (error: unknown) {
      this.logger.warn(`[!] Could not scrape ${label}: ${describeError(error)}`);
      return null;
    }
  }

  private async writeDebugArtifacts(root: HTMLElement): Promise<void> {
    try {
      const filename = await savePageSource(root, this.debugFile);
      this.logger.log(`[+] HTML saved to ${filename} for inspection`);
    } catch (error: unknown) {
      this.logger.warn(`[!] Could not save page source: ${describeError(error)}`);
    }
    this.writer.write(formatStructureReport(root));
  }
}

/**
 * Convenience function for a one-off profile scrape.
 *
 * @param url The company website to profile
 * @param options Debug flag and optional collaborators
 */
export async function scrapeCompanyProfile(url: string, options: CompanyProfilerOptions = {}): Promise<CompanyProfile> {
  const profiler = new CompanyProfiler(options);
  return profiler.scrape(url);
}
