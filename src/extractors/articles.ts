import type { HTMLElement } from "node-html-parser";
import type { Article, LinkEntry } from "../types.js";
import { ARTICLE_CARD_LIMIT, ARTICLE_TITLE_LENGTH, ARTICLE_TITLE_TAGS, BLOG_KEYWORDS } from "../constants.js";
import { attributeOf, findAll, findFirst, strippedText, tagNameOf } from "../utils/dom.js";
import { linkMentions } from "../utils/link-catalog.js";
import { OrderedSet } from "../utils/ordered-set.js";

/** URLs of blog-like links (blog, news, insights, ...) in catalog order. */
export function findBlogCandidates(catalog: ReadonlyArray<LinkEntry>): string[] {
  return catalog.filter((link) => linkMentions(link, BLOG_KEYWORDS)).map((link) => link.url);
}

function articleUrl(titleElement: HTMLElement, blogUrl: string): string | null {
  if (tagNameOf(titleElement) !== "a") return null;
  const href = attributeOf(titleElement, "href");
  if (!href) return null;
  try {
    return new URL(href, blogUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Article titles from a blog listing page. Each classed article/div card contributes
 * its first heading or link; links keep their URL, headings get `null`.
 */
export function extractArticles(root: HTMLElement, blogUrl: string): Article[] {
  const articles = new OrderedSet<Article>((article) => JSON.stringify([article.title, article.url]));

  for (const card of findAll(root, ["article", "div"], { limit: ARTICLE_CARD_LIMIT, withClass: true })) {
    const titleElement = findFirst(card, ARTICLE_TITLE_TAGS);
    if (!titleElement) continue;

    const title = strippedText(titleElement);
    if (title.length <= ARTICLE_TITLE_LENGTH.min || title.length >= ARTICLE_TITLE_LENGTH.max) continue;

    articles.add({ title, url: articleUrl(titleElement, blogUrl) });
  }

  return articles.toArray();
}
