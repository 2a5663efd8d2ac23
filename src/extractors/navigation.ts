import type { LinkEntry, NavigationLinks } from "../types.js";
import { ABOUT_KEYWORD, NAVIGATION_KEYWORDS } from "../constants.js";
import { linkMentions } from "../utils/link-catalog.js";

function pathLength(url: string): number {
  try {
    return new URL(url).pathname.length;
  } catch {
    return url.length;
  }
}

/**
 * Picks the about-page link: the first candidate, replaced by any later candidate
 * whose path is strictly shorter.
 */
export function findAboutLink(catalog: ReadonlyArray<LinkEntry>): string | null {
  let best: string | null = null;

  for (const link of catalog) {
    if (!linkMentions(link, [ABOUT_KEYWORD])) continue;
    if (best === null || pathLength(link.url) < pathLength(best)) {
      best = link.url;
    }
  }

  return best;
}

/** First link in catalog order mentioning any of `keywords`. */
export function findFirstLink(catalog: ReadonlyArray<LinkEntry>, keywords: ReadonlyArray<string>): string | null {
  return catalog.find((link) => linkMentions(link, keywords))?.url ?? null;
}

export function extractNavigationLinks(catalog: ReadonlyArray<LinkEntry>): NavigationLinks {
  return {
    about: findAboutLink(catalog),
    contact: findFirstLink(catalog, NAVIGATION_KEYWORDS.contact),
    careers: findFirstLink(catalog, NAVIGATION_KEYWORDS.careers),
    privacy: findFirstLink(catalog, NAVIGATION_KEYWORDS.privacy),
    returns: findFirstLink(catalog, NAVIGATION_KEYWORDS.returns),
    terms: findFirstLink(catalog, NAVIGATION_KEYWORDS.terms),
  };
}
