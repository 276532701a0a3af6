import { createElement, createText, spliceAll } from "../tree";
import type { Pass } from "../types";
import { editableText } from "./helpers";

const FOOTNOTE_PATTERN = /\[(\d*)\]/;

/**
 * Footnote counter for one article. `[]` takes the next number; `[n]` shows
 * n and moves the counter past it, unless n points back at an earlier note.
 *
 * @example
 * // [1] [] [] [5] []  ->  1 2 3 5 6
 */
export class FootnoteState {
  // Markers may carry digit runs beyond Number precision
  private expected = 1n;

  /** The number to display for a marker's digits */
  resolve(literal: string): string {
    if (literal === "") {
      return String(this.expected++);
    }
    const number = BigInt(literal);
    if (number >= this.expected) {
      this.expected = number + 1n;
    }
    return String(number);
  }
}

export const footnotesPass: Pass = {
  name: "footnotes",

  run(article) {
    const state = new FootnoteState();
    for (const text of editableText(article.content, ["verbatim", "link"])) {
      spliceAll(text, FOOTNOTE_PATTERN, (match) => {
        return createElement("sup", {}, [createText(state.resolve(match[1]))]);
      });
    }
  },
};
