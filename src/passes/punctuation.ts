import type { Pass } from "../types";
import { rewriteText } from "./helpers";

/**
 * House style puts sentence punctuation inside the closing quote
 *
 * @example
 * moveIntoQuotes("he said “no”.") // "he said “no.”"
 */
export function moveIntoQuotes(data: string): string {
  return data.replace(/([’”])([.!?;:,])/g, "$2$1");
}

/**
 * Footnote markers follow trailing punctuation: "end[1]." becomes "end.[1]"
 */
export function moveFootnoteAfterPunctuation(data: string): string {
  return data.replace(/(\[\d*\])([.,!?;:])/g, "$2$1");
}

export const punctuationInQuotesPass: Pass = {
  name: "punctuation-in-quotes",

  run(article) {
    rewriteText(article.content, ["verbatim", "link"], moveIntoQuotes);
  },
};

export const footnotePunctuationPass: Pass = {
  name: "footnote-punctuation",

  run(article) {
    rewriteText(article.content, ["verbatim", "link"], moveFootnoteAfterPunctuation);
  },
};
