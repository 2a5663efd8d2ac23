import type { Article, CompanyProfile, NavigationLinks, ProcessStep } from "./types.js";

/**
 * Everything the extractors may contribute to a profile. Missing parts fall back
 * to "not found" defaults.
 */
export interface ProfileParts {
  companyName?: string | null;
  aboutDescription?: string | null;
  navigation?: Partial<NavigationLinks>;
  services?: ReadonlyArray<string>;
  clients?: ReadonlyArray<string>;
  process?: ReadonlyArray<ProcessStep>;
  articles?: ReadonlyArray<Article>;
  email?: string | null;
  phone?: string | null;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Merges extractor output into a single, frozen profile for `website`.
 */
export function assembleProfile(website: string, parts: ProfileParts = {}): CompanyProfile {
  const navigation = parts.navigation ?? {};

  const profile: CompanyProfile = {
    companyName: parts.companyName ?? null,
    website,
    about: {
      description: parts.aboutDescription ?? null,
      pageUrl: navigation.about ?? null,
    },
    services: [...(parts.services ?? [])],
    clients: [...(parts.clients ?? [])],
    process: (parts.process ?? []).map((step) => ({ ...step })),
    articles: (parts.articles ?? []).map((article) => ({ ...article })),
    contact: {
      contactPage: navigation.contact ?? null,
      email: parts.email ?? null,
      phone: parts.phone ?? null,
    },
    careers: {
      pageUrl: navigation.careers ?? null,
    },
    policies: {
      privacyPolicy: navigation.privacy ?? null,
      returnsPolicy: navigation.returns ?? null,
      termsOfService: navigation.terms ?? null,
    },
  };

  return deepFreeze(profile);
}

/** The profile returned when the primary page could not be fetched. */
export function createEmptyProfile(website: string): CompanyProfile {
  return assembleProfile(website);
}
