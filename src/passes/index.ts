/**
 * Pass catalog
 * Order matters: later passes rely on the tags earlier ones produce
 */

import type { Pass } from "../types";
import { captionsPass } from "./captions";
import { codeBlocksPass } from "./code-blocks";
import { dashesPass } from "./dashes";
import { ellipsesPass } from "./ellipses";
import { embedsPass } from "./embeds";
import { emphasisPass } from "./emphasis";
import { footnotesPass } from "./footnotes";
import { imagesPass } from "./images";
import { inlineCodePass } from "./inline-code";
import { linksPass } from "./links";
import { listsPass } from "./lists";
import { manualHighlightingPass } from "./manual-highlighting";
import { mathPass } from "./math";
import { lineBreaksPass, normalizeNewlinesPass } from "./newlines";
import { footnotePunctuationPass, punctuationInQuotesPass } from "./punctuation";
import { quoteListsPass } from "./quote-lists";
import { quotesPass } from "./quotes";
import { ratingFractionsPass } from "./fractions";
import { extraneousSpacesPass } from "./spaces";

export const PASSES: readonly Pass[] = [
  captionsPass,
  normalizeNewlinesPass,
  embedsPass,
  imagesPass,
  mathPass,
  inlineCodePass,
  manualHighlightingPass,
  codeBlocksPass,
  lineBreaksPass,
  ellipsesPass,
  linksPass,
  dashesPass,
  quotesPass,
  punctuationInQuotesPass,
  extraneousSpacesPass,
  // Markers move behind punctuation before they are numbered
  footnotePunctuationPass,
  footnotesPass,
  emphasisPass,
  quoteListsPass,
  ratingFractionsPass,
  // Unwrapping happens last
  listsPass,
];

export {
  captionsPass,
  codeBlocksPass,
  dashesPass,
  ellipsesPass,
  embedsPass,
  emphasisPass,
  extraneousSpacesPass,
  footnotePunctuationPass,
  footnotesPass,
  imagesPass,
  inlineCodePass,
  lineBreaksPass,
  linksPass,
  listsPass,
  manualHighlightingPass,
  mathPass,
  normalizeNewlinesPass,
  punctuationInQuotesPass,
  quoteListsPass,
  quotesPass,
  ratingFractionsPass,
};
