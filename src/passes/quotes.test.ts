import { describe, expect, it } from "vitest";
import { LINKED_TEXT, makeArticle, makeLinkedArticle, markup, passContext } from "../test-utils";
import { applyDirectionalQuotes, quoteDirection, quotesPass } from "./quotes";

function resolve(content: string): string {
  const article = makeArticle(content);
  quotesPass.run(article, passContext());
  return markup(article.content);
}

describe("quoteDirection", () => {
  it("opens at the start, after whitespace and after opening punctuation", () => {
    expect(quoteDirection(undefined)).toBe("opening");
    expect(quoteDirection(" ")).toBe("opening");
    expect(quoteDirection("\n")).toBe("opening");
    expect(quoteDirection("(")).toBe("opening");
    expect(quoteDirection("—")).toBe("opening");
    expect(quoteDirection("“")).toBe("opening");
  });

  it("closes after anything else", () => {
    expect(quoteDirection("a")).toBe("closing");
    expect(quoteDirection(".")).toBe("closing");
    expect(quoteDirection("”")).toBe("closing");
  });
});

describe("applyDirectionalQuotes", () => {
  it("maps double and single quotes independently", () => {
    expect(applyDirectionalQuotes(`"Hi," she said. 'Bye.'`)).toBe("“Hi,” she said. ‘Bye.’");
  });

  it("reads apostrophes as closing quotes", () => {
    expect(applyDirectionalQuotes("don't")).toBe("don’t");
  });

  it("sees quotes resolved earlier in the same string", () => {
    expect(applyDirectionalQuotes(`"'nested'"`)).toBe("“‘nested’”");
  });
});

describe("quotesPass", () => {
  it("resolves quotes next to an element as if the element were not there", () => {
    const split = resolve(`The "quick" <em>fox</em>`);
    const plain = resolve(`The "quick" fox`);

    expect(split).toBe("The “quick” <em>fox</em>");
    expect(plain).toBe("The “quick” fox");
  });

  it("borrows context across node boundaries", () => {
    expect(resolve(`"<em>text</em>"`)).toBe("“<em>text</em>”");
    expect(resolve(`<em>He</em>'s here`)).toBe("<em>He</em>’s here");
  });

  it("does not borrow context from another block", () => {
    expect(resolve(`<p>Intro.</p><ul><li>'A'</li><li>"B"</li></ul>`)).toBe(
      "<p>Intro.</p><ul><li>‘A’</li><li>“B”</li></ul>",
    );
  });

  it("leaves code alone", () => {
    expect(resolve(`<code>"x"</code> "y"`)).toBe(`<code>"x"</code> “y”`);
  });

  it("leaves link text alone", () => {
    const article = makeLinkedArticle(LINKED_TEXT);
    quotesPass.run(article, passContext());
    expect(markup(article.content)).toBe(`<link href="https://example.org">${LINKED_TEXT}</link>`);
  });
});
