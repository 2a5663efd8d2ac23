import { describe, it, expect } from "vitest";
import { parseDocument } from "../src/utils/dom.js";
import { buildLinkCatalog, linkMentions } from "../src/utils/link-catalog.js";

describe("buildLinkCatalog", () => {
  const html = `
    <a href="/about">About Us</a>
    <a href="https://acme.test/contact">Contact</a>
    <a href="https://other.test/partners">Partner</a>
    <a href="mailto:hello@acme.test">Email</a>
    <a href="">Empty</a>
    <a>No href</a>
    <a href="//cdn.other.test/file">CDN</a>
    <a href="Careers.html"><span>Join</span> <span>Us</span></a>
  `;

  it("keeps same-origin and relative links in document order", () => {
    const catalog = buildLinkCatalog(parseDocument(html), "https://acme.test/home");
    expect(catalog).toEqual([
      { url: "https://acme.test/about", text: "about us", href: "/about" },
      { url: "https://acme.test/contact", text: "contact", href: "https://acme.test/contact" },
      { url: "mailto:hello@acme.test", text: "email", href: "mailto:hello@acme.test" },
      { url: "https://acme.test/Careers.html", text: "joinus", href: "careers.html" },
    ]);
  });

  it("treats a different port as a different origin", () => {
    const root = parseDocument('<a href="http://acme.test/x">X</a><a href="http://acme.test:8080/y">Y</a>');
    const catalog = buildLinkCatalog(root, "http://acme.test:8080/");
    expect(catalog.map((link) => link.url)).toEqual(["http://acme.test:8080/y"]);
  });

  it("returns an empty catalog for a page without links", () => {
    expect(buildLinkCatalog(parseDocument("<p>No links</p>"), "https://acme.test/")).toEqual([]);
  });
});

describe("linkMentions", () => {
  const link = { url: "https://acme.test/jobs", text: "work here", href: "/jobs" };

  it("matches keywords in the href or the text", () => {
    expect(linkMentions(link, ["job"])).toBe(true);
    expect(linkMentions(link, ["work"])).toBe(true);
    expect(linkMentions(link, ["privacy"])).toBe(false);
  });
});
