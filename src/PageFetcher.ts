import type { PageFetchOptions, PageFetchResult, PageFetcherOptions } from "./types.js";
import type { IPageFetcher } from "./IPageFetcher.js";
import { COMMON_HEADERS, PRIMARY_FETCH_TIMEOUT_MS } from "./constants.js";
import { FetchError } from "./errors.js";

/**
 * Custom error class for non-2xx responses from PageFetcher.
 */
export class PageFetchHttpError extends FetchError {
  constructor(message: string, statusCode: number, url?: string) {
    super(message, "ERR_HTTP_ERROR", { statusCode, url });
    this.name = "PageFetchHttpError";
  }
}

/**
 * PageFetcher - fetches page HTML using the standard `fetch` API.
 *
 * Sends a browser-like header set and follows redirects. There are no retries:
 * each call either resolves with the page or rejects with a FetchError.
 */
export class PageFetcher implements IPageFetcher {
  private readonly options: Required<PageFetcherOptions>;

  private static readonly DEFAULT_OPTIONS: Required<PageFetcherOptions> = {
    timeoutMs: PRIMARY_FETCH_TIMEOUT_MS,
    headers: {},
  };

  constructor(options: PageFetcherOptions = {}) {
    this.options = { ...PageFetcher.DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetches the page at `url`.
   *
   * @throws {PageFetchHttpError} If the HTTP response status is not ok (e.g., 404, 500).
   * @throws {FetchError} With code ERR_FETCH_TIMEOUT when the timeout elapses, ERR_FETCH_FAILED otherwise.
   */
  async fetchPage(url: string, options: PageFetchOptions = {}): Promise<PageFetchResult> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    // Call-specific headers override constructor headers, which override the defaults
    const finalHeaders = {
      ...COMMON_HEADERS,
      ...this.options.headers,
      ...options.headers,
    };

    try {
      const response = await fetch(url, {
        redirect: "follow",
        headers: finalHeaders,
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        // Release the connection without waiting for the body
        await response.body?.cancel();
        throw new PageFetchHttpError(`HTTP error! status: ${response.status}`, response.status, url);
      }

      const html = await response.text();

      return {
        html,
        url: response.url || url,
        statusCode: response.status,
      };
    } catch (error: unknown) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new FetchError(`Request timed out after ${timeoutMs}ms`, "ERR_FETCH_TIMEOUT", {
          url,
          originalError: error,
        });
      }
      const message = error instanceof Error ? error.message : "Unknown fetch error";
      throw new FetchError(`Fetch failed: ${message}`, "ERR_FETCH_FAILED", {
        url,
        originalError: error instanceof Error ? error : undefined,
      });
    }
  }
}
