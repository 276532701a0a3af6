import { describe, expect, it } from "vitest";
import { makeArticle, markup, passContext } from "../test-utils";
import { manualHighlightingPass } from "./manual-highlighting";

describe("manualHighlightingPass", () => {
  it("maps formatting inside code to highlight roles", () => {
    const article = makeArticle("<pre>a <b>b</b> <em>c</em> <u>d</u></pre> <b>e</b>");
    manualHighlightingPass.run(article, passContext());
    expect(markup(article.content)).toBe(
      "<pre>a <hl_bold>b</hl_bold> <hl_italic>c</hl_italic> <hl_underline>d</hl_underline></pre> <b>e</b>",
    );
  });
});
