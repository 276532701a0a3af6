import type { Pass } from "../types";
import { rewriteText } from "./helpers";

// Letters, digits and ASCII punctuation (plus the interrobang)
const SINGLE_SPACED = "A-Za-z0-9À-ÖØ-öø-ÿ!\"#$%&'()*+,\\-./:;<=>?@[\\\\\\]^_`{|}~‽";

// Some editors type a no-break space followed by a space after punctuation
const NBSP_PAIRS = new RegExp(`(?<=[${SINGLE_SPACED}])(?:\u00A0 )+`, "g");
const SPACE_RUNS = new RegExp(`(?<=[${SINGLE_SPACED}]) +`, "g");

export interface SpacingResult {
  data: string;
  nbspPairs: boolean;
}

/**
 * Collapse the spacing after a character to a single space
 *
 * @example
 * collapseSpaces("End.  Next") // { data: "End. Next", nbspPairs: false }
 */
export function collapseSpaces(data: string): SpacingResult {
  const paired = data.replace(NBSP_PAIRS, " ");
  return {
    data: paired.replace(SPACE_RUNS, " "),
    nbspPairs: paired !== data,
  };
}

export const extraneousSpacesPass: Pass = {
  name: "extraneous-spaces",

  run(article, ctx) {
    let nbspPairs = false;
    const changed = rewriteText(article.content, ["verbatim"], (data) => {
      const result = collapseSpaces(data);
      nbspPairs ||= result.nbspPairs;
      return result.data;
    });

    if (changed > 0) {
      ctx.logger.info(
        `Removed extraneous spaces in article "${article.title}"${nbspPairs ? ". Some were nbsp-sp pairs." : ""}`,
      );
    }
  },
};
