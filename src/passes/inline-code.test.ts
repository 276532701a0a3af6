import { describe, expect, it } from "vitest";
import { makeArticle, markup, passContext } from "../test-utils";
import { inlineCodePass } from "./inline-code";

describe("inlineCodePass", () => {
  it("turns backtick spans into code", () => {
    const article = makeArticle("run `ls -la` then `pwd`");
    inlineCodePass.run(article, passContext());
    expect(markup(article.content)).toBe("run <code>ls -la</code> then <code>pwd</code>");
  });

  it("leaves preformatted text alone", () => {
    const article = makeArticle("<pre>`raw`</pre>");
    inlineCodePass.run(article, passContext());
    expect(markup(article.content)).toBe("<pre>`raw`</pre>");
  });
});
