import type { Pass } from "../types";
import { rewriteText } from "./helpers";

/**
 * Dash normalization, applied in this order:
 * 1. a hyphen (or two) between digits becomes an unspaced en dash;
 * 2. spaced and doubled hyphens become em dashes;
 * 3. every em dash gets exactly one space on each side.
 *
 * @example
 * normalizeDashes("pages 5 - 10") // "pages 5–10"
 * normalizeDashes("wait -- what") // "wait — what"
 */
export function normalizeDashes(data: string): string {
  return data
    .replace(/(?<=\d) ?--? ?(?=\d)/g, "–")
    .replace(/ - /g, "—")
    .replace(/ --- /g, "—")
    .replace(/---/g, "—")
    .replace(/ -- /g, "—")
    .replace(/--/g, "—")
    .replace(/ *— */g, " — ");
}

export const dashesPass: Pass = {
  name: "dashes",

  run(article) {
    rewriteText(article.content, ["verbatim", "link"], normalizeDashes);
  },
};
