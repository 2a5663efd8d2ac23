import type { HTMLElement } from "node-html-parser";
import {
  CLIENT_IMAGE_LABEL_LENGTH,
  CLIENT_KEYWORDS,
  CLIENT_TEXT_LENGTH,
  CLIENT_TEXT_TAGS,
  CONTAINER_TAGS,
  REGEX_CLIENT_LABEL_SUFFIX,
  SECTION_HEADING_TAGS,
} from "../constants.js";
import { attributeOf, findAll, findParent, headingsMatching, strippedText } from "../utils/dom.js";
import { OrderedSet } from "../utils/ordered-set.js";

function imageLabel(image: HTMLElement): string | null {
  const label = attributeOf(image, "alt").trim() || attributeOf(image, "title").trim();
  if (label.length <= CLIENT_IMAGE_LABEL_LENGTH.min || label.length >= CLIENT_IMAGE_LABEL_LENGTH.max) {
    return null;
  }
  return label.replace(REGEX_CLIENT_LABEL_SUFFIX, "");
}

/**
 * Client names found near client-like headings ("Our Clients", "Trusted by", ...).
 *
 * Logo images come first (alt text, else title, minus a trailing "logo"/"icon"/"image"),
 * then every short text element in the same container. This casts a wide net and will
 * pick up non-client text that happens to be short.
 */
export function extractClients(root: HTMLElement): string[] {
  const clients = new OrderedSet<string>();

  for (const heading of headingsMatching(root, SECTION_HEADING_TAGS, CLIENT_KEYWORDS)) {
    const container = findParent(heading, CONTAINER_TAGS);
    if (!container) continue;

    for (const image of findAll(container, ["img"])) {
      const label = imageLabel(image);
      if (label) {
        clients.add(label);
      }
    }

    for (const element of findAll(container, CLIENT_TEXT_TAGS)) {
      const text = strippedText(element);
      if (text.length > CLIENT_TEXT_LENGTH.min && text.length < CLIENT_TEXT_LENGTH.max) {
        clients.add(text);
      }
    }
  }

  return clients.toArray();
}
