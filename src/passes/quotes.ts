/**
 * Quote Direction Resolver
 *
 * Straight quotes become directional ones. A quote opens when nothing,
 * whitespace or opening punctuation comes before it, and closes otherwise.
 *
 * Quotes often sit at a text node boundary (`"<em>word</em>"`), so each text
 * node is resolved with one character of its neighbours glued on. The glue
 * comes from the original payloads, snapshotted before any replacement, and
 * never crosses a block boundary.
 */

import { ancestorElements, isProtectedAny, replaceText, textNodes } from "../tree";
import type { Element, Text } from "../tree";
import type { Pass } from "../types";

const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "p",
  "li",
  "ul",
  "ol",
  "div",
  "blockquote",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "pre",
  "caption",
  "figcaption",
  "footer",
  "table",
  "tr",
  "td",
  "th",
]);

export type QuoteDirection = "opening" | "closing";

const OPENING_PUNCTUATION: ReadonlySet<string> = new Set([
  "(",
  "[",
  "{",
  "<",
  "“",
  "‘",
  "—",
  "–",
]);

export function quoteDirection(before: string | undefined): QuoteDirection {
  if (before === undefined || /\s/.test(before) || OPENING_PUNCTUATION.has(before)) {
    return "opening";
  }
  return "closing";
}

function directionalQuote(quote: '"' | "'", direction: QuoteDirection): string {
  switch (direction) {
    case "opening":
      return quote === '"' ? "“" : "‘";
    case "closing":
      return quote === '"' ? "”" : "’";
  }
}

/**
 * Resolve every straight quote in `data`, left to right. Each quote sees the
 * already resolved character before it.
 */
export function applyDirectionalQuotes(data: string): string {
  const chars = data.split("");
  chars.forEach((char, index) => {
    if (char !== '"' && char !== "'") return;
    const before = index > 0 ? chars[index - 1] : undefined;
    chars[index] = directionalQuote(char, quoteDirection(before));
  });
  return chars.join("");
}

/**
 * Resolve `node` as if the last character of `previous` and the first
 * character of `next` were part of it
 */
export function resolveQuotes(
  node: Text,
  previous: Text | undefined,
  next: Text | undefined,
): string {
  const before = previous ? previous.data.slice(-1) : "";
  const after = next ? next.data.slice(0, 1) : "";
  const resolved = applyDirectionalQuotes(before + node.data + after);
  return resolved.slice(before.length, resolved.length - after.length);
}

/** Nearest enclosing block element, or null at the top level */
function blockOf(node: Text): Element | null {
  return ancestorElements(node).find((element) => BLOCK_TAGS.has(element.name)) ?? null;
}

export const quotesPass: Pass = {
  name: "quotes",

  run(article) {
    const snapshot = textNodes(article.content);
    // Taken up front: replaced nodes lose their ancestors
    const blocks = snapshot.map(blockOf);
    const neighbour = (index: number, other: number): Text | undefined =>
      blocks[other] === blocks[index] ? snapshot[other] : undefined;

    snapshot.forEach((node, index) => {
      if (isProtectedAny(node, ["verbatim", "link"])) return;

      const data = resolveQuotes(node, neighbour(index, index - 1), neighbour(index, index + 1));
      if (data !== node.data) replaceText(node, data);
    });
  },
};
