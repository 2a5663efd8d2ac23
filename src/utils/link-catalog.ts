import type { HTMLElement } from "node-html-parser";
import type { LinkEntry } from "../types.js";
import { REGEX_HREF_NETWORK_LOCATION } from "../constants.js";
import { attributeOf, findAll, strippedText } from "./dom.js";

function resolveUrl(href: string, base: string): URL | null {
  try {
    return new URL(href, base);
  } catch {
    return null;
  }
}

/**
 * Enumerates the same-origin links of a page.
 *
 * Each anchor with a non-empty href is resolved against `pageUrl`. A link is kept when
 * its host (including port) matches the page's, or when the raw href has no network
 * location of its own (relative paths, `mailto:`, `tel:`). Document order is preserved.
 */
export function buildLinkCatalog(root: HTMLElement, pageUrl: string): LinkEntry[] {
  const pageHost = resolveUrl(pageUrl, pageUrl)?.host ?? "";
  const catalog: LinkEntry[] = [];

  for (const anchor of findAll(root, ["a"])) {
    const href = attributeOf(anchor, "href");
    if (!href) continue;

    const resolved = resolveUrl(href, pageUrl);
    if (!resolved) continue;

    const isRelative = !REGEX_HREF_NETWORK_LOCATION.test(href.trim());
    if (resolved.host !== pageHost && !isRelative) continue;

    catalog.push({
      url: resolved.toString(),
      text: strippedText(anchor).toLowerCase(),
      href: href.toLowerCase(),
    });
  }

  return catalog;
}

/** True when the link's href or text contains any of `keywords`. */
export function linkMentions(link: LinkEntry, keywords: ReadonlyArray<string>): boolean {
  return keywords.some((keyword) => link.href.includes(keyword) || link.text.includes(keyword));
}
