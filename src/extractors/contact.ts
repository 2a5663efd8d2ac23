import type { HTMLElement } from "node-html-parser";
import { PLACEHOLDER_EMAIL_DOMAINS, REGEX_EMAIL, REGEX_PHONE } from "../constants.js";
import { visibleText } from "../utils/dom.js";

export interface ContactMatches {
  email: string | null;
  phone: string | null;
}

function isPlaceholderEmail(email: string): boolean {
  const lowered = email.toLowerCase();
  return PLACEHOLDER_EMAIL_DOMAINS.some((domain) => lowered.includes(domain));
}

/** First email in `text` that isn't on a template/placeholder domain. */
export function findEmail(text: string): string | null {
  const emails = text.match(REGEX_EMAIL) ?? [];
  return emails.find((email) => !isPlaceholderEmail(email)) ?? null;
}

/** First North-American style phone number in `text`, as ddd-ddd-dddd. */
export function findPhone(text: string): string | null {
  const match = REGEX_PHONE.exec(text);
  if (!match) return null;
  return `${match[1]}-${match[2]}-${match[3]}`;
}

export function extractContactDetails(root: HTMLElement): ContactMatches {
  const text = visibleText(root);
  return {
    email: findEmail(text),
    phone: findPhone(text),
  };
}
