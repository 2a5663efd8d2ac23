import type { IPageFetcher } from "./IPageFetcher.js";
import type {
  Article,
  CompanyProfile,
  ContactDetails,
  LinkEntry,
  Logger,
  NavigationLinks,
  OutputWriter,
  PageFetchOptions,
  PageFetchResult,
  PageFetcherOptions,
  Policies,
  ProcessStep,
} from "./types.js";

export type {
  IPageFetcher,
  Article,
  CompanyProfile,
  ContactDetails,
  LinkEntry,
  Logger,
  NavigationLinks,
  OutputWriter,
  PageFetchOptions,
  PageFetchResult,
  PageFetcherOptions,
  Policies,
  ProcessStep,
};
export { PageFetcher, PageFetchHttpError } from "./PageFetcher.js";
export { CompanyProfiler, scrapeCompanyProfile } from "./CompanyProfiler.js";
export type { CompanyProfilerOptions } from "./CompanyProfiler.js";
export { FetchError, ConfigError } from "./errors.js";
export type { FetchErrorCode, FetchErrorDetails } from "./errors.js";
export { loadConfig } from "./config.js";
export type { ProfilerConfig } from "./config.js";
export { assembleProfile, createEmptyProfile } from "./profile.js";
export type { ProfileParts } from "./profile.js";
export { buildLinkCatalog } from "./utils/link-catalog.js";
export { parseDocument } from "./utils/dom.js";
export * from "./extractors/index.js";
export * from "./reporters/index.js";
