import { describe, expect, it, vi } from "vitest";
import { makeArticle, markup, passContext } from "../test-utils";
import { collapseSpaces, extraneousSpacesPass } from "./spaces";

describe("collapseSpaces", () => {
  it("collapses runs of spaces after a character", () => {
    expect(collapseSpaces("End.  Next   word")).toEqual({ data: "End. Next word", nbspPairs: false });
  });

  it("removes no-break space and space pairs", () => {
    expect(collapseSpaces("End.\u00A0 Next")).toEqual({ data: "End. Next", nbspPairs: true });
  });

  it("keeps leading indentation", () => {
    expect(collapseSpaces("   indented")).toEqual({ data: "   indented", nbspPairs: false });
  });
});

describe("extraneousSpacesPass", () => {
  it("logs the article title when something changed", () => {
    const ctx = passContext();
    const info = vi.spyOn(ctx.logger, "info").mockImplementation(() => undefined);
    const article = makeArticle("One.  Two <pre>a  b</pre>", { title: "Spacing" });

    extraneousSpacesPass.run(article, ctx);

    expect(markup(article.content)).toBe("One. Two <pre>a  b</pre>");
    expect(info).toHaveBeenCalledWith('Removed extraneous spaces in article "Spacing"');
  });

  it("stays quiet when nothing changed", () => {
    const ctx = passContext();
    const info = vi.spyOn(ctx.logger, "info").mockImplementation(() => undefined);

    extraneousSpacesPass.run(makeArticle("Fine as is."), ctx);

    expect(info).not.toHaveBeenCalled();
  });
});
