import { VERBATIM_TAGS, findByName, findElements } from "../tree";
import type { Pass } from "../types";
import { getSyntaxHighlightTagName } from "../utils/syntax-highlight";
import type { SyntaxHighlightType } from "../utils/syntax-highlight";

const MANUAL_HIGHLIGHTS: ReadonlyMap<string, SyntaxHighlightType> = new Map([
  ["strong", "bold"],
  ["b", "bold"],
  ["em", "italic"],
  ["i", "italic"],
  ["u", "underline"],
]);

/**
 * Formatting an author applied by hand inside code becomes highlight roles
 */
export const manualHighlightingPass: Pass = {
  name: "manual-highlighting",

  run(article) {
    for (const block of findByName(article.content, VERBATIM_TAGS)) {
      for (const element of findElements(block, (e) => MANUAL_HIGHLIGHTS.has(e.name))) {
        const type = MANUAL_HIGHLIGHTS.get(element.name);
        if (type) element.name = getSyntaxHighlightTagName(type);
      }
    }
  },
};
