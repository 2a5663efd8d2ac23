import { describe, it, expect } from "vitest";
import { parseDocument } from "../src/utils/dom.js";
import { extractAboutDescription } from "../src/extractors/about.js";

const FOUNDED = "Acme was founded in 2009 to help mid-sized firms move their workloads to the cloud.";
const TEAM = "Our engineers have delivered more than two hundred migrations for retail and finance.";
const VALUES = "We think good infrastructure should be boring, predictable and fairly priced.";
const EXTRA = "This fourth long paragraph should never make it into the description at all.";

describe("extractAboutDescription", () => {
  it("joins the first three long paragraphs outside page chrome", () => {
    const root = parseDocument(`
      <html><body>
        <header><p>This header paragraph is long enough to be counted if it were kept in.</p></header>
        <nav><p>Home About Services Careers Blog Contact and a few more navigation words</p></nav>
        <main>
          <p>Short intro.</p>
          <p>${FOUNDED}</p>
          <p>${TEAM}</p>
          <p>${VALUES}</p>
          <p>${EXTRA}</p>
        </main>
        <footer><p>Footer text that is also quite long and should be removed before scanning.</p></footer>
      </body></html>
    `);
    expect(extractAboutDescription(root)).toBe(`${FOUNDED} ${TEAM} ${VALUES}`);
  });

  it("returns null when no paragraph is long enough", () => {
    expect(extractAboutDescription(parseDocument("<main><p>Hello.</p><p>Welcome to Acme.</p></main>"))).toBeNull();
  });
});
