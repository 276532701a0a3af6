import { createElement, createText, spliceAll } from "../tree";
import type { Pass } from "../types";
import { editableText } from "./helpers";

const INLINE_CODE_PATTERN = /`([\s\S]+?)`/;

/**
 * Backtick spans become <code> elements
 */
export const inlineCodePass: Pass = {
  name: "inline-code",

  run(article) {
    for (const text of editableText(article.content, ["verbatim"])) {
      spliceAll(text, INLINE_CODE_PATTERN, (match) =>
        createElement("code", {}, [createText(match[1])]),
      );
    }
  },
};
