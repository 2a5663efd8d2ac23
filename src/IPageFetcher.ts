import type { PageFetchOptions, PageFetchResult } from "./types.js";

/**
 * Anything that can retrieve a page's HTML for the profiler.
 */
export interface IPageFetcher {
  /**
   * Fetches a page, following redirects.
   * @param url The URL to fetch
   * @param options Optional timeout and headers
   * @returns A promise that resolves to the body, final URL and status
   * @throws {FetchError} On network failure, timeout or a non-2xx status
   */
  fetchPage(url: string, options?: PageFetchOptions): Promise<PageFetchResult>;
}
