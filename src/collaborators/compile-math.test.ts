import { describe, expect, it } from "vitest";
import { buildLatexDocument } from "./compile-math";

describe("buildLatexDocument", () => {
  const config = { packages: ["amsmath"], macros: [String.raw`\newcommand{\R}{\mathbb{R}}`] };

  it("wraps an inline formula in a cropped preview", () => {
    expect(buildLatexDocument("x^2", false, config)).toBe(
      [
        String.raw`\documentclass{article}`,
        String.raw`\usepackage{amsmath}`,
        String.raw`\usepackage[active,tightpage,pdftex]{preview}`,
        String.raw`\newcommand{\R}{\mathbb{R}}`,
        String.raw`\begin{document}`,
        String.raw`\thispagestyle{empty}`,
        String.raw`\begin{preview}`,
        String.raw`\(x^2\)`,
        String.raw`\end{preview}`,
        String.raw`\end{document}`,
        "",
      ].join("\n"),
    );
  });

  it("uses display delimiters in display mode", () => {
    const document = buildLatexDocument(String.raw`\sum_i i`, true, { packages: [], macros: [] });
    expect(document.split("\n")[5]).toBe(String.raw`\[\sum_i i\]`);
  });
});
