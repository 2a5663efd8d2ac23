import { HTMLElement, TextNode } from "node-html-parser";
import type { Node } from "node-html-parser";
import { tagNameOf } from "./dom.js";

const VOID_TAGS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

const RAW_TEXT_TAGS: ReadonlySet<string> = new Set(["script", "style"]);

const INDENT = " ";

function openTag(element: HTMLElement): string {
  const attrs = element.rawAttrs.trim();
  return attrs ? `<${tagNameOf(element)} ${attrs}>` : `<${tagNameOf(element)}>`;
}

function render(node: Node, depth: number, lines: string[]): void {
  const pad = INDENT.repeat(depth);

  if (node instanceof TextNode) {
    const text = node.rawText.trim();
    if (text) lines.push(pad + text);
    return;
  }
  if (!(node instanceof HTMLElement)) return;

  const tag = tagNameOf(node);
  if (!tag) {
    for (const child of node.childNodes) render(child, depth, lines);
    return;
  }

  lines.push(pad + openTag(node));
  if (VOID_TAGS.has(tag)) return;

  if (RAW_TEXT_TAGS.has(tag)) {
    const body = node.rawText.trim();
    if (body) lines.push(pad + INDENT + body);
  } else {
    for (const child of node.childNodes) render(child, depth + 1, lines);
  }
  lines.push(`${pad}</${tag}>`);
}

/**
 * Re-serializes a parsed document with one node per line and one space of
 * indentation per nesting level.
 */
export function prettifyHTML(root: HTMLElement): string {
  const lines: string[] = [];
  render(root, 0, lines);
  return `${lines.join("\n")}\n`;
}
