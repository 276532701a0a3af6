import { describe, expect, it } from "vitest";
import { LINKED_TEXT, makeArticle, makeLinkedArticle, markup, passContext } from "../test-utils";
import { LINK_PATTERN, linksPass } from "./links";

describe("LINK_PATTERN", () => {
  it("stops before trailing sentence punctuation", () => {
    expect(LINK_PATTERN.exec("see www.example.org/about.")?.[0]).toBe("www.example.org/about");
  });

  it("needs a known top-level domain", () => {
    expect(LINK_PATTERN.exec("see example.net")).toBeNull();
  });
});

describe("linksPass", () => {
  it("wraps bare addresses", () => {
    const article = makeArticle("Visit example.com today.");
    linksPass.run(article, passContext());
    expect(markup(article.content)).toBe(
      'Visit <link href="example.com">example.com</link> today.',
    );
  });

  it("leaves code alone", () => {
    const article = makeArticle("<code>example.com</code>");
    linksPass.run(article, passContext());
    expect(markup(article.content)).toBe("<code>example.com</code>");
  });

  it("leaves link text alone", () => {
    const article = makeLinkedArticle(LINKED_TEXT);
    linksPass.run(article, passContext());
    expect(markup(article.content)).toBe(`<link href="https://example.org">${LINKED_TEXT}</link>`);
  });
});
