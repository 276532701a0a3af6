import { describe, expect, it } from "vitest";
import { makeArticle, markup, passContext } from "../test-utils";
import { LINE_SEPARATOR, breakLines, lineBreaksPass, normalizeNewlinesPass } from "./newlines";

describe("breakLines", () => {
  it("turns single newlines into line separators", () => {
    expect(breakLines("roses\nviolets", false, false)).toBe(`roses${LINE_SEPARATOR}violets`);
  });

  it("keeps paragraph breaks", () => {
    expect(breakLines("one\n\ntwo", false, false)).toBe("one\n\ntwo");
  });

  it("keeps a newline next to an element", () => {
    expect(breakLines("\nafter", true, false)).toBe("\nafter");
    expect(breakLines("before\n", false, true)).toBe("before\n");
    expect(breakLines("\nafter", false, false)).toBe(`${LINE_SEPARATOR}after`);
  });

  it("keeps a lone newline between two elements", () => {
    expect(breakLines("\n", true, true)).toBe("\n");
  });
});

describe("newline passes", () => {
  it("normalize line endings and break lines outside code", () => {
    const article = makeArticle("a\r\nb<code>x\ny</code>");
    const ctx = passContext();
    normalizeNewlinesPass.run(article, ctx);
    lineBreaksPass.run(article, ctx);
    expect(markup(article.content)).toBe(`a${LINE_SEPARATOR}b<code>x\ny</code>`);
  });
});
