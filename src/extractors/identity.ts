import type { HTMLElement } from "node-html-parser";
import { REGEX_LOGO_ALT, REGEX_LOGO_WORD, TITLE_SEPARATORS } from "../constants.js";
import { attributeOf, descendantElements, findAll, findFirst, tagNameOf } from "../utils/dom.js";

function nameFromTitle(root: HTMLElement): string | null {
  const title = findFirst(root, ["title"]);
  if (!title) return null;

  let candidate = title.text.trim();
  for (const separator of TITLE_SEPARATORS) {
    candidate = candidate.split(separator)[0];
  }
  return candidate.trim() || null;
}

function nameFromSiteNameMeta(root: HTMLElement): string | null {
  for (const element of descendantElements(root)) {
    if (tagNameOf(element) === "meta" && element.getAttribute("property") === "og:site_name") {
      return attributeOf(element, "content").trim() || null;
    }
  }
  return null;
}

function nameFromLogoAlt(root: HTMLElement): string | null {
  const logo = findAll(root, ["img"]).find((image) => REGEX_LOGO_ALT.test(attributeOf(image, "alt")));
  if (!logo) return null;
  return attributeOf(logo, "alt").replace(REGEX_LOGO_WORD, "").trim() || null;
}

/**
 * Resolves the company name from the page title, then `og:site_name`, then the
 * logo's alt text. Each later source overrides the earlier ones when it yields a
 * non-empty name.
 */
export function extractCompanyName(root: HTMLElement): string | null {
  let companyName: string | null = null;

  for (const resolve of [nameFromTitle, nameFromSiteNameMeta, nameFromLogoAlt]) {
    const candidate = resolve(root);
    if (candidate) {
      companyName = candidate;
    }
  }

  return companyName;
}
