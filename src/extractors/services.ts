import type { HTMLElement } from "node-html-parser";
import {
  CARD_HEADING_TAGS,
  CONTAINER_TAGS,
  REGEX_SERVICE_PHRASE,
  SECTION_HEADING_TAGS,
  SERVICE_CARD_HEADING_MIN_LENGTH,
  SERVICE_CARD_LIMIT,
  SERVICE_CARD_TEXT_LENGTH,
  SERVICE_ITEM_LENGTH,
  SERVICE_KEYWORDS,
  SERVICE_LIST_LIMIT,
  SERVICE_PHRASE_MIN_LENGTH,
} from "../constants.js";
import { findAll, findFirst, findParent, headingsMatching, strippedText, visibleText } from "../utils/dom.js";
import { OrderedSet } from "../utils/ordered-set.js";

function collectFromSection(container: HTMLElement, services: OrderedSet<string>): void {
  // List items
  for (const list of findAll(container, ["ul", "ol"], { limit: SERVICE_LIST_LIMIT })) {
    for (const item of findAll(list, ["li"])) {
      const service = strippedText(item);
      if (service.length > SERVICE_ITEM_LENGTH.min && service.length < SERVICE_ITEM_LENGTH.max) {
        services.add(service);
      }
    }
  }

  // Cards: a classed div with a short body and its own heading
  for (const card of findAll(container, ["div"], { limit: SERVICE_CARD_LIMIT, withClass: true })) {
    const cardText = strippedText(card);
    if (cardText.length <= SERVICE_CARD_TEXT_LENGTH.min || cardText.length >= SERVICE_CARD_TEXT_LENGTH.max) {
      continue;
    }
    const innerHeading = findFirst(card, CARD_HEADING_TAGS);
    if (!innerHeading) continue;

    const service = strippedText(innerHeading);
    if (service.length > SERVICE_CARD_HEADING_MIN_LENGTH) {
      services.add(service);
    }
  }
}

/**
 * Phrases introduced by "We offer", "We provide", "We deliver" or "We specialize in"
 * anywhere in the page's visible text.
 */
export function extractServicePhrases(root: HTMLElement): string[] {
  const phrases: string[] = [];
  for (const match of visibleText(root).matchAll(REGEX_SERVICE_PHRASE)) {
    const phrase = match[2].trim();
    if (phrase.length > SERVICE_PHRASE_MIN_LENGTH) {
      phrases.push(phrase);
    }
  }
  return phrases;
}

/**
 * Services listed under service-like headings, followed by "We offer ..." phrases.
 */
export function extractServices(root: HTMLElement): string[] {
  const services = new OrderedSet<string>();

  for (const heading of headingsMatching(root, SECTION_HEADING_TAGS, SERVICE_KEYWORDS)) {
    const container = findParent(heading, CONTAINER_TAGS);
    if (container) {
      collectFromSection(container, services);
    }
  }

  for (const phrase of extractServicePhrases(root)) {
    services.add(phrase);
  }

  return services.toArray();
}
