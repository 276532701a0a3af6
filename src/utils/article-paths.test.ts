import { describe, expect, it } from "vitest";
import { getArticleSlug, getImageLocation, getPdfLocation } from "./article-paths";

describe("getArticleSlug", () => {
  it("joins the start of the title with the id", () => {
    expect(getArticleSlug({ title: "Hello World, again", id: "42" })).toBe("Hello_Worl_42");
  });

  it("drops characters that are unsafe in file names", () => {
    expect(getArticleSlug({ title: "Café au lait", id: "7" })).toBe("Caf_au_la_7");
    expect(getArticleSlug({ title: "C++: a tour", id: "8" })).toBe("C_a_tou_8");
  });
});

describe("asset locations", () => {
  const article = { title: "Hello World", id: "42" };

  it("numbers images with three digits", () => {
    expect(getImageLocation(article, "cat.png", 7)).toBe("img/Hello_Worl_42_007_cat.png");
  });

  it("puts formulas under pdf", () => {
    expect(getPdfLocation(article, "abc123")).toBe("pdf/Hello_Worl_42_abc123");
  });
});
