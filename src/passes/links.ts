import { createElement, createText, spliceAll } from "../tree";
import type { Pass } from "../types";
import { editableText } from "./helpers";

const URL_CHAR = String.raw`[A-Za-z0-9\-._~:/?#\[\]@!$&'()*+,;%=]`;
// Characters a URL may end with; sentence punctuation after it stays outside
const URL_END_CHAR = String.raw`[A-Za-z0-9\-_~/#\[\]@$&'()*+%=]`;
const TLD = String.raw`(?:\.com|\.ca|\.org|\.gov)`;

/**
 * Bare addresses with a recognised top-level domain, e.g. "www.example.org/about"
 */
export const LINK_PATTERN = new RegExp(
  `${URL_CHAR}+${TLD}(?:${URL_CHAR}*${URL_END_CHAR}+)?`,
);

export const linksPass: Pass = {
  name: "links",

  run(article) {
    for (const text of editableText(article.content, ["verbatim", "link"])) {
      spliceAll(text, LINK_PATTERN, ([url]) =>
        createElement("link", { href: url }, [createText(url)]),
      );
    }
  },
};
