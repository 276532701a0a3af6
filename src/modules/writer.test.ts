import { describe, expect, it } from "vitest";
import { makeArticle } from "../test-utils";
import { cleanupIssue, renderArticle, renderIssue } from "./writer";

describe("renderArticle", () => {
  it("renders title, subtitle, content and byline", () => {
    const article = makeArticle("Body", { title: "Cats & Dogs", subtitle: "Sub", author: "Ada" });
    expect(renderArticle(article)).toBe(
      "<article><title>Cats &amp; Dogs</title>\n<subtitle>Sub</subtitle>\n" +
        "<content>Body\n<address>Ada</address></content></article>",
    );
  });

  it("keeps typographic characters readable", () => {
    const article = makeArticle("The “quick” fox — café");
    expect(renderArticle(article)).toBe(
      "<article><title>Test Article</title>\n<content>The “quick” fox — café</content></article>",
    );
  });

  it("puts the byline before the postscript footer without touching the tree", () => {
    const article = makeArticle("Body\n<footer>PS</footer>", { author: "Ada" });

    expect(renderArticle(article)).toBe(
      "<article><title>Test Article</title>\n" +
        "<content>Body\n<address>Ada</address>\n<footer>PS</footer></content></article>",
    );
    expect(article.content.children).toHaveLength(2);
  });
});

describe("cleanupIssue", () => {
  it("drops blank lines outside preformatted blocks", () => {
    expect(cleanupIssue("a\n\n\nb<pre>x\n\ny</pre>\n  \nc")).toBe("a\nb<pre>x\n\ny</pre>\nc");
  });

  it("drops newlines just inside list tags", () => {
    expect(cleanupIssue("<ul>\nA\n</ul><ol>\nB\n</ol>")).toBe("<ul>A</ul><ol>B</ol>");
  });
});

describe("renderIssue", () => {
  it("wraps the articles in an issue element", () => {
    expect(renderIssue([])).toBe("<issue></issue>");
    expect(renderIssue([makeArticle("A", { title: "One" }), makeArticle("B", { title: "Two" })])).toBe(
      "<issue><article><title>One</title>\n<content>A</content></article>\n" +
        "<article><title>Two</title>\n<content>B</content></article></issue>",
    );
  });
});
