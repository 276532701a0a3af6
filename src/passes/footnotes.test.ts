import { describe, expect, it } from "vitest";
import { LINKED_TEXT, makeArticle, makeLinkedArticle, markup, passContext } from "../test-utils";
import { findByName } from "../tree";
import { FootnoteState, footnotesPass } from "./footnotes";

function numbers(content: string): string[] {
  const article = makeArticle(content);
  footnotesPass.run(article, passContext());
  return findByName(article.content, ["sup"]).map((sup) => markup(sup.children));
}

describe("FootnoteState", () => {
  it("numbers empty markers from one", () => {
    const state = new FootnoteState();
    expect([state.resolve(""), state.resolve(""), state.resolve("")]).toEqual(["1", "2", "3"]);
  });

  it("skips past an explicit number ahead of the counter", () => {
    const state = new FootnoteState();
    expect([state.resolve("1"), state.resolve(""), state.resolve(""), state.resolve("5"), state.resolve("")]).toEqual(["1", "2", "3", "5", "6"]);
  });

  it("shows long digit runs exactly and counts on from them", () => {
    const state = new FootnoteState();
    expect([state.resolve("123456789012345678901234"), state.resolve(""), state.resolve("007")]).toEqual([
      "123456789012345678901234",
      "123456789012345678901235",
      "7",
    ]);
  });

  it("keeps counting after a back reference", () => {
    const state = new FootnoteState();
    expect([state.resolve(""), state.resolve(""), state.resolve("1"), state.resolve("")]).toEqual(["1", "2", "1", "3"]);
  });
});

describe("footnotesPass", () => {
  it("turns markers into superscripts across text nodes", () => {
    expect(numbers("One[1] two[] <em>three[]</em> four[5] five[]")).toEqual([
      "1",
      "2",
      "3",
      "5",
      "6",
    ]);
  });

  it("splices the superscript in place of the marker", () => {
    const article = makeArticle("Note[] here.");
    footnotesPass.run(article, passContext());
    expect(markup(article.content)).toBe("Note<sup>1</sup> here.");
  });

  it("starts again at one for every article", () => {
    expect(numbers("a[] b[]")).toEqual(["1", "2"]);
    expect(numbers("c[]")).toEqual(["1"]);
  });

  it("displays a long marker as written", () => {
    expect(numbers("a[123456789012345678901234]")).toEqual(["123456789012345678901234"]);
  });

  it("ignores markers in code", () => {
    expect(numbers("<code>arr[]</code> note[]")).toEqual(["1"]);
  });

  it("leaves link text alone", () => {
    const article = makeLinkedArticle(LINKED_TEXT);
    footnotesPass.run(article, passContext());
    expect(markup(article.content)).toBe(`<link href="https://example.org">${LINKED_TEXT}</link>`);
  });
});
