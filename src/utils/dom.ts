import { parse, HTMLElement, TextNode } from "node-html-parser";
import type { Node } from "node-html-parser";

// Elements whose text never reaches the reader.
const INVISIBLE_TEXT_TAGS: ReadonlySet<string> = new Set(["script", "style", "template"]);

export interface FindOptions {
  /** Stop after this many matches. */
  limit?: number;
  /** Only match elements that carry a class attribute. */
  withClass?: boolean;
}

/**
 * Parses an HTML document. Script and style bodies are kept as raw text so the
 * debug dump stays faithful; every other element is parsed normally.
 */
export function parseDocument(html: string): HTMLElement {
  return parse(html, {
    comment: false,
    blockTextElements: {
      script: true,
      style: true,
    },
  });
}

/** Lowercased tag name, or "" for the document root. */
export function tagNameOf(element: HTMLElement): string {
  return (element.rawTagName || "").toLowerCase();
}

/**
 * Yields every descendant element of `root` in document order (root excluded).
 */
export function* descendantElements(root: HTMLElement): Generator<HTMLElement> {
  for (const child of root.childNodes) {
    if (child instanceof HTMLElement) {
      yield child;
      yield* descendantElements(child);
    }
  }
}

/**
 * Collects descendants of `root` whose tag is one of `tags`, in document order.
 */
export function findAll(root: HTMLElement, tags: ReadonlyArray<string>, options: FindOptions = {}): HTMLElement[] {
  const { limit = Infinity, withClass = false } = options;
  const found: HTMLElement[] = [];
  if (limit <= 0) return found;

  for (const element of descendantElements(root)) {
    if (!tags.includes(tagNameOf(element))) continue;
    if (withClass && !element.hasAttribute("class")) continue;
    found.push(element);
    if (found.length >= limit) break;
  }
  return found;
}

/** First descendant of `root` whose tag is one of `tags`. */
export function findFirst(root: HTMLElement, tags: ReadonlyArray<string>): HTMLElement | null {
  return findAll(root, tags, { limit: 1 })[0] ?? null;
}

/** Nearest ancestor of `element` whose tag is one of `tags`. */
export function findParent(element: HTMLElement, tags: ReadonlyArray<string>): HTMLElement | null {
  let current = element.parentNode;
  while (current) {
    if (tags.includes(tagNameOf(current))) {
      return current;
    }
    current = current.parentNode;
  }
  return null;
}

function collectTextNodes(node: Node, out: TextNode[]): void {
  if (node instanceof TextNode) {
    out.push(node);
    return;
  }
  if (node instanceof HTMLElement) {
    if (INVISIBLE_TEXT_TAGS.has(tagNameOf(node))) return;
    for (const child of node.childNodes) {
      collectTextNodes(child, out);
    }
  }
}

/** Visible text nodes under `root`, in document order. */
export function visibleTextNodes(root: HTMLElement): TextNode[] {
  const nodes: TextNode[] = [];
  collectTextNodes(root, nodes);
  return nodes;
}

/**
 * All visible text under `root`, concatenated as-is (whitespace preserved).
 */
export function visibleText(root: HTMLElement): string {
  return visibleTextNodes(root)
    .map((node) => node.text)
    .join("");
}

/**
 * Visible text under `root` with every text fragment trimmed and the non-empty
 * fragments joined without a separator.
 */
export function strippedText(root: HTMLElement): string {
  return visibleTextNodes(root)
    .map((node) => node.text.trim())
    .filter((fragment) => fragment.length > 0)
    .join("");
}

/** Attribute value, or "" when absent. */
export function attributeOf(element: HTMLElement, name: string): string {
  return element.getAttribute(name) ?? "";
}

/**
 * Headings of `root` whose lowercased stripped text contains any of `keywords`, in document order.
 */
export function headingsMatching(
  root: HTMLElement,
  tags: ReadonlyArray<string>,
  keywords: ReadonlyArray<string>
): HTMLElement[] {
  return findAll(root, tags).filter((heading) => {
    const headingText = strippedText(heading).toLowerCase();
    return keywords.some((keyword) => headingText.includes(keyword));
  });
}
