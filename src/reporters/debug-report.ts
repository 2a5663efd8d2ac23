import { writeFile } from "node:fs/promises";
import type { HTMLElement } from "node-html-parser";
import {
  DEBUG_HEADING_LENGTH,
  DEBUG_HEADING_SAMPLE,
  DEBUG_HEADING_TAGS,
  DEBUG_IMAGE_SAMPLE,
  DEBUG_IMAGE_SRC_LENGTH,
  DEBUG_LINK_SAMPLE,
  DEFAULT_DEBUG_FILENAME,
  REGEX_DEBUG_CLIENT_MENTION,
  REGEX_DEBUG_SERVICE_MENTION,
  REPORT_RULE,
} from "../constants.js";
import { attributeOf, findAll, strippedText, visibleTextNodes } from "../utils/dom.js";
import { prettifyHTML } from "../utils/pretty-html.js";

function countMentions(root: HTMLElement, pattern: RegExp): number {
  return visibleTextNodes(root).filter((node) => pattern.test(node.text)).length;
}

/**
 * Summarises what a page contains: links, headings, keyword mentions and images.
 * Used to see why an extractor did or didn't find something.
 */
export function formatStructureReport(root: HTMLElement): string {
  const lines: string[] = ["", REPORT_RULE, "DEBUG: PAGE STRUCTURE ANALYSIS", REPORT_RULE];

  const links = findAll(root, ["a"]).filter((anchor) => anchor.hasAttribute("href"));
  lines.push("", `[DEBUG] Total links found: ${links.length}`, `[DEBUG] Sample links (first ${DEBUG_LINK_SAMPLE}):`);
  links.slice(0, DEBUG_LINK_SAMPLE).forEach((anchor, index) => {
    lines.push(`  ${index + 1}. Text: '${strippedText(anchor)}' | Href: '${attributeOf(anchor, "href")}'`);
  });

  lines.push("", "[DEBUG] Headings found:");
  for (const tag of DEBUG_HEADING_TAGS) {
    const headings = findAll(root, [tag]);
    lines.push(`  ${tag.toUpperCase()}: ${headings.length} found`);
    for (const heading of headings.slice(0, DEBUG_HEADING_SAMPLE)) {
      lines.push(`    - ${strippedText(heading).slice(0, DEBUG_HEADING_LENGTH)}`);
    }
  }

  lines.push("", "[DEBUG] Looking for common patterns...");
  lines.push(`  Elements mentioning 'service/solution': ${countMentions(root, REGEX_DEBUG_SERVICE_MENTION)}`);
  lines.push(`  Elements mentioning 'client/customer': ${countMentions(root, REGEX_DEBUG_CLIENT_MENTION)}`);

  const images = findAll(root, ["img"]);
  lines.push("", `[DEBUG] Images found: ${images.length}`);
  images.slice(0, DEBUG_IMAGE_SAMPLE).forEach((image, index) => {
    const alt = image.getAttribute("alt") ?? "No alt";
    const src = image.getAttribute("src") ?? "No src";
    lines.push(`  ${index + 1}. Alt: '${alt}' | Src: '${src.slice(0, DEBUG_IMAGE_SRC_LENGTH)}'`);
  });

  lines.push("", REPORT_RULE);
  return `${lines.join("\n")}\n`;
}

/**
 * Writes the prettified page source for manual inspection.
 * @returns The filename written.
 */
export async function savePageSource(root: HTMLElement, filename: string = DEFAULT_DEBUG_FILENAME): Promise<string> {
  await writeFile(filename, prettifyHTML(root), "utf-8");
  return filename;
}
