import { describe, it, expect } from "vitest";
import {
  findAll,
  findFirst,
  findParent,
  parseDocument,
  strippedText,
  tagNameOf,
  visibleText,
} from "../src/utils/dom.js";
import { prettifyHTML } from "../src/utils/pretty-html.js";
import { OrderedSet } from "../src/utils/ordered-set.js";

describe("dom helpers", () => {
  it("joins trimmed text fragments without a separator", () => {
    const root = parseDocument("<ul><li> <b>Web</b> Design </li></ul>");
    expect(strippedText(root)).toBe("WebDesign");
  });

  it("decodes entities", () => {
    const root = parseDocument("<p>R&amp;D</p>");
    expect(strippedText(root)).toBe("R&D");
  });

  it("leaves script and style text out of visible text", () => {
    const root = parseDocument("<body><p>Hi</p><script>var a = 1;</script><style>p { color: red; }</style><p>there</p></body>");
    expect(visibleText(root)).toBe("Hithere");
  });

  it("finds elements in document order with class and limit filters", () => {
    const root = parseDocument('<div id="outer"><div class="a">1</div><div>2</div><div class="b">3</div></div>');
    expect(findAll(root, ["div"]).map((el) => el.getAttribute("id") ?? strippedText(el))).toEqual(["outer", "1", "2", "3"]);
    expect(findAll(root, ["div"], { withClass: true }).map(strippedText)).toEqual(["1", "3"]);
    expect(findAll(root, ["div"], { withClass: true, limit: 1 }).map(strippedText)).toEqual(["1"]);
  });

  it("does not include the starting element itself", () => {
    const root = parseDocument('<div class="card"><p>Body</p></div>');
    const card = findFirst(root, ["div"]);
    if (!card) throw new Error("card not parsed");
    expect(findAll(card, ["div"])).toEqual([]);
    expect(findFirst(card, ["p"])?.text).toBe("Body");
  });

  it("finds the nearest matching ancestor", () => {
    const root = parseDocument("<section><div><h2>Title</h2></div></section>");
    const heading = findFirst(root, ["h2"]);
    if (!heading) throw new Error("heading not parsed");
    const nearest = findParent(heading, ["div", "section"]);
    const section = findParent(heading, ["section"]);
    expect(nearest && tagNameOf(nearest)).toBe("div");
    expect(section && tagNameOf(section)).toBe("section");
    expect(findParent(heading, ["main"])).toBeNull();
  });
});

describe("prettifyHTML", () => {
  it("puts one node per line with single-space indentation", () => {
    const root = parseDocument('<div class="a"><p>Hi <b>there</b></p><br><script>var x = 1;</script></div>');
    expect(prettifyHTML(root)).toBe(
      [
        '<div class="a">',
        " <p>",
        "  Hi",
        "  <b>",
        "   there",
        "  </b>",
        " </p>",
        " <br>",
        " <script>",
        "  var x = 1;",
        " </script>",
        "</div>",
        "",
      ].join("\n")
    );
  });
});

describe("OrderedSet", () => {
  it("keeps the first occurrence in insertion order", () => {
    const set = new OrderedSet<string>();
    expect(set.add("b")).toBe(true);
    expect(set.add("a")).toBe(true);
    expect(set.add("b")).toBe(false);
    expect(set.toArray()).toEqual(["b", "a"]);
  });

  it("compares by key when one is given", () => {
    const set = new OrderedSet<{ title: string; url: string | null }>((item) => JSON.stringify([item.title, item.url]));
    set.add({ title: "Post", url: null });
    set.add({ title: "Post", url: null });
    set.add({ title: "Post", url: "https://acme.test/post" });
    expect(set.toArray()).toEqual([
      { title: "Post", url: null },
      { title: "Post", url: "https://acme.test/post" },
    ]);
  });
});
