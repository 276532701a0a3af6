import { describe, expect, it } from "vitest";
import { makeArticle, markup, passContext } from "../test-utils";
import { emphasisPass } from "./emphasis";

describe("emphasisPass", () => {
  it("combines italic inside bold", () => {
    const article = makeArticle("<b>bold <i>both</i></b>");
    emphasisPass.run(article, passContext());
    expect(markup(article.content)).toBe("<b>bold <em2>both</em2></b>");
  });

  it("combines bold inside italic", () => {
    const article = makeArticle("<em>x <strong>y</strong></em>");
    emphasisPass.run(article, passContext());
    expect(markup(article.content)).toBe("<em>x <em2>y</em2></em>");
  });
});
