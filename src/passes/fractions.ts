import type { Pass } from "../types";
import { rewriteText } from "./helpers";

const HAIR_SPACE = "\u200A";

/**
 * "7/10" is a rating, not a fraction; hair spaces around the slash keep
 * layout software from setting it as one
 */
export function spaceRatings(data: string): string {
  return data.replace(/(\d+)\/10(?!\d)/g, `$1${HAIR_SPACE}/${HAIR_SPACE}10`);
}

export const ratingFractionsPass: Pass = {
  name: "rating-fractions",

  run(article) {
    rewriteText(article.content, ["verbatim", "link"], spaceRatings);
  },
};
