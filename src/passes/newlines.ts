import { isTag } from "../tree";
import type { ChildNode, Text } from "../tree";
import type { Pass } from "../types";
import { rewriteText } from "./helpers";

/** Unicode LINE SEPARATOR; layout software keeps it inside the paragraph */
export const LINE_SEPARATOR = "\u2028";

const SINGLE_NEWLINE = /(?<!\n)\n(?!\n)/;

export const normalizeNewlinesPass: Pass = {
  name: "normalize-newlines",

  run(article) {
    rewriteText(article.content, ["verbatim"], (data) =>
      data.replace(/\r\n/g, "\n"),
    );
  },
};

function hasElementSibling(node: Text, direction: "prev" | "next"): boolean {
  let sibling: ChildNode | null = node[direction];
  while (sibling) {
    if (isTag(sibling)) return true;
    sibling = sibling[direction];
  }
  return false;
}

/**
 * Turn single newlines into line separators. Double newlines stay paragraph
 * breaks, and a newline at the very start or end of the text stays a newline
 * when an element sits on that side of it.
 */
export function breakLines(
  data: string,
  elementBefore: boolean,
  elementAfter: boolean,
): string {
  const parts = data.split(SINGLE_NEWLINE);
  if (parts.length === 1) return data;

  let prefix = "";
  let suffix = "";
  if (parts[0] === "" && elementBefore) {
    parts.shift();
    prefix = "\n";
  }
  if (parts.length > 0 && parts[parts.length - 1] === "" && elementAfter) {
    parts.pop();
    suffix = "\n";
  }
  // A lone newline between two elements
  if (parts.length === 0) return data;

  return prefix + parts.join(LINE_SEPARATOR) + suffix;
}

export const lineBreaksPass: Pass = {
  name: "line-breaks",

  run(article) {
    // TODO: tell block from inline siblings, a poem line ending in <em> keeps its "\n"
    rewriteText(article.content, ["verbatim"], (data, node) =>
      breakLines(
        data,
        hasElementSibling(node, "prev"),
        hasElementSibling(node, "next"),
      ),
    );
  },
};
