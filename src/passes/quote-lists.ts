import { findByName } from "../tree";
import type { Pass } from "../types";

/**
 * Articles that are collections of quotations style their bulleted lists
 * through a dedicated tag
 */
export const quoteListsPass: Pass = {
  name: "quote-lists",

  run(article, ctx) {
    const { titles, tag } = ctx.quoteLists;
    if (!titles.includes(article.title)) return;

    for (const list of findByName(article.content, ["ul"])) {
      list.name = tag;
    }
  },
};
