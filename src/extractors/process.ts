import type { HTMLElement } from "node-html-parser";
import type { ProcessStep } from "../types.js";
import {
  CARD_HEADING_TAGS,
  CONTAINER_TAGS,
  PROCESS_CARD_LIMIT,
  PROCESS_CARD_NUMBER_WINDOW,
  PROCESS_CARD_TEXT_LENGTH,
  PROCESS_DESCRIPTION_MAX_LENGTH,
  PROCESS_KEYWORDS,
  PROCESS_STEP_MIN_LENGTH,
  REGEX_STEP_NUMBER,
  SECTION_HEADING_TAGS,
} from "../constants.js";
import { findAll, findFirst, findParent, headingsMatching, strippedText } from "../utils/dom.js";

function looksLikeStepCard(card: HTMLElement, text: string): boolean {
  return REGEX_STEP_NUMBER.test(text.slice(0, PROCESS_CARD_NUMBER_WINDOW)) || findFirst(card, CARD_HEADING_TAGS) !== null;
}

/**
 * Process steps found under process-like headings.
 *
 * Ordered-list items are numbered by their position in the list. Classed div/article
 * cards are then numbered on from the number of steps collected so far. Step numbers
 * restart per list and may repeat when several sections match.
 */
export function extractProcess(root: HTMLElement): ProcessStep[] {
  const steps: ProcessStep[] = [];

  for (const heading of headingsMatching(root, SECTION_HEADING_TAGS, PROCESS_KEYWORDS)) {
    const container = findParent(heading, CONTAINER_TAGS);
    if (!container) continue;

    for (const list of findAll(container, ["ol"])) {
      findAll(list, ["li"]).forEach((item, index) => {
        const description = strippedText(item);
        if (description.length > PROCESS_STEP_MIN_LENGTH) {
          steps.push({ step: index + 1, description });
        }
      });
    }

    const firstCardStep = steps.length + 1;
    findAll(container, ["div", "article"], { limit: PROCESS_CARD_LIMIT, withClass: true }).forEach((card, index) => {
      const text = strippedText(card);
      if (text.length <= PROCESS_CARD_TEXT_LENGTH.min || text.length >= PROCESS_CARD_TEXT_LENGTH.max) return;
      if (!looksLikeStepCard(card, text)) return;
      steps.push({
        step: firstCardStep + index,
        description: text.slice(0, PROCESS_DESCRIPTION_MAX_LENGTH),
      });
    });
  }

  return steps;
}
