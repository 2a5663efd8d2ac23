import type { HTMLElement } from "node-html-parser";
import { ABOUT_PAGE_NOISE_TAGS, ABOUT_PARAGRAPH_LIMIT, ABOUT_PARAGRAPH_MIN_LENGTH } from "../constants.js";
import { findAll, strippedText } from "../utils/dom.js";

/**
 * Builds a description from the first substantial paragraphs of an about page.
 * Scripts, styles, navigation, headers and footers are removed from `root` first.
 */
export function extractAboutDescription(root: HTMLElement): string | null {
  for (const element of findAll(root, ABOUT_PAGE_NOISE_TAGS)) {
    element.remove();
  }

  const paragraphs: string[] = [];
  for (const paragraph of findAll(root, ["p"])) {
    const text = strippedText(paragraph);
    if (text.length > ABOUT_PARAGRAPH_MIN_LENGTH) {
      paragraphs.push(text);
      if (paragraphs.length >= ABOUT_PARAGRAPH_LIMIT) break;
    }
  }

  return paragraphs.length > 0 ? paragraphs.join(" ") : null;
}
