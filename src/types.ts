/**
 * Result of fetching a single page.
 */
export interface PageFetchResult {
  /** The response body as text. */
  html: string;
  /** The final URL after any redirects. */
  url: string;
  /** The HTTP status code of the final response. */
  statusCode: number;
}

/**
 * Options that can be passed per-request to fetchPage().
 */
export interface PageFetchOptions {
  /** Abort the request after this many milliseconds. */
  timeoutMs?: number;
  /** Optional headers to include in the request. */
  headers?: Record<string, string>;
}

/**
 * Configuration options for the PageFetcher.
 */
export interface PageFetcherOptions {
  /** Default timeout for requests that don't pass their own. Default: 15000 */
  timeoutMs?: number;
  /** Optional headers to include in every request. */
  headers?: Record<string, string>;
}

/**
 * A same-origin hyperlink found on a fetched page.
 */
export interface LinkEntry {
  /** Absolute URL, resolved against the page's final URL. */
  url: string;
  /** Lowercased visible text of the anchor. */
  text: string;
  /** Lowercased raw href attribute. */
  href: string;
}

export interface AboutSection {
  readonly description: string | null;
  readonly pageUrl: string | null;
}

export interface ProcessStep {
  /** Position within its source list or section; not unique across sections. */
  readonly step: number;
  readonly description: string;
}

export interface Article {
  readonly title: string;
  readonly url: string | null;
}

export interface ContactDetails {
  readonly contactPage: string | null;
  readonly email: string | null;
  readonly phone: string | null;
}

export interface CareersSection {
  readonly pageUrl: string | null;
}

export interface Policies {
  readonly privacyPolicy: string | null;
  readonly returnsPolicy: string | null;
  readonly termsOfService: string | null;
}

/**
 * The structured profile produced by one scraping run.
 */
export interface CompanyProfile {
  readonly companyName: string | null;
  /** The URL that was requested, not the redirect target. */
  readonly website: string;
  readonly about: AboutSection;
  readonly services: readonly string[];
  readonly clients: readonly string[];
  readonly process: readonly ProcessStep[];
  readonly articles: readonly Article[];
  readonly contact: ContactDetails;
  readonly careers: CareersSection;
  readonly policies: Policies;
}

/**
 * Links picked out of a page's link catalog, one per category.
 */
export interface NavigationLinks {
  about: string | null;
  contact: string | null;
  careers: string | null;
  privacy: string | null;
  returns: string | null;
  terms: string | null;
}

/**
 * Minimal logging surface the pipeline writes progress to.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Destination for rendered reports.
 */
export interface OutputWriter {
  write(chunk: string): unknown;
}
