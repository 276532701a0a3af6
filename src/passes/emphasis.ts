import { findByName } from "../tree";
import type { Pass } from "../types";

const BOLD = ["b", "strong"];
const ITALIC = ["i", "em"];

/**
 * Italic inside bold, or bold inside italic, is a single combined style
 */
export const emphasisPass: Pass = {
  name: "emphasis",

  run(article) {
    for (const bold of findByName(article.content, BOLD)) {
      for (const italic of findByName(bold, ITALIC)) {
        italic.name = "em2";
      }
    }
    for (const italic of findByName(article.content, ITALIC)) {
      for (const bold of findByName(italic, BOLD)) {
        bold.name = "em2";
      }
    }
  },
};
