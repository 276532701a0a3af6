/**
 * Code block formatting
 *
 * A block may start with an option header, one `:name: value` per line and
 * a blank line after it:
 *
 *     :lang: ruby
 *     :linenos: 10
 *
 *     puts "hello"
 *
 * `lang` selects automatic highlighting and `linenos` numbers the lines,
 * starting at 1 or at its value. Every block ends up as `<pre><code>`.
 */

import {
  createElement,
  createText,
  isTag,
  isText,
  findByName,
  insertChild,
  parseFragment,
  removeNode,
  replaceChildren,
  replaceText,
  spliceAll,
  textNodes,
} from "../tree";
import type { ChildNode, Element, ParentNode, Text } from "../tree";
import type { Article, CodeOptions, Pass, PassContext } from "../types";
import { reportFailure } from "./helpers";

const OPTION_PATTERN = /:(\S+?):[ \t]*([^\r\n]*)/g;
const OPTIONS_BLOCK_PATTERN = /^(?:\s*:\S+?:[ \t]*[^\r\n]*\r?\n)+[ \t]*(?:\r?\n)+/;
const LINE_START_PATTERN = /(?<=\n)(?=[\s\S])/;

// ============================================================================
// Options
// ============================================================================

export interface OptionsHeader {
  options: CodeOptions;
  length: number; // Characters taken by the header, blank lines included
}

/**
 * Parse the option header at the top of a code block, if there is one
 *
 * @example
 * parseOptionsHeader(":lang: js\n:linenos:\n\nlet a;")
 * // => { options: { lang: "js", linenos: true }, length: 21 }
 */
export function parseOptionsHeader(source: string): OptionsHeader | null {
  const block = OPTIONS_BLOCK_PATTERN.exec(source);
  if (!block) return null;

  const options: CodeOptions = {};
  for (const [, name, value] of block[0].matchAll(OPTION_PATTERN)) {
    options[name] = value.trim() || true;
  }
  return { options, length: block[0].length };
}

/**
 * Code is left alone by newline normalization, so CRLF endings are dropped
 * here before the header and the lines are read
 */
function normalizeLineEndings(container: Element): void {
  for (const text of textNodes(container)) {
    if (text.data.includes("\r\n")) {
      replaceText(text, text.data.replace(/\r\n/g, "\n"));
    }
  }
}

function stripOptionsHeader(container: Element): CodeOptions {
  const [first] = container.children;
  if (!first || !isText(first)) return {};

  const header = parseOptionsHeader(first.data);
  if (!header) return {};

  const rest = first.data.slice(header.length);
  if (rest) {
    replaceText(first, rest);
  } else {
    removeNode(first);
  }
  return header.options;
}

function firstLineNumber(options: CodeOptions): number {
  const value = options.linenos;
  return typeof value === "string" && /^\d+$/.test(value) ? Number(value) : 1;
}

// ============================================================================
// Highlighting
// ============================================================================

function highlight(
  container: Element,
  options: CodeOptions,
  article: Article,
  ctx: PassContext,
): void {
  // Blocks the author highlighted by hand keep their markup
  if (!options.lang || !container.children.every(isText)) return;

  const source = textNodes(container)
    .map((text) => text.data)
    .join("");
  try {
    const markup = ctx.collaborators.highlightCode(source, options);
    replaceChildren(container, parseFragment(markup));
  } catch (error) {
    const [firstLine] = source.split("\n", 1);
    reportFailure(ctx, article, codeBlocksPass.name, firstLine, error);
  }
}

// ============================================================================
// Line numbers
// ============================================================================

/**
 * The outermost node inside `container` that starts with `text`, so a line
 * number never ends up inside a highlight element
 */
function lineAnchor(text: Text, container: Element): ChildNode {
  let anchor: ChildNode = text;
  let parent: ParentNode | null = anchor.parent;
  while (parent && parent !== container && isTag(parent) && parent.children[0] === anchor) {
    anchor = parent;
    parent = anchor.parent;
  }
  return anchor;
}

function addLineNumbers(container: Element, start: number): void {
  let next = start;
  const lineno = () => createElement("lineno", {}, [createText(String(next++))]);

  let atLineStart = true;
  for (const text of textNodes(container)) {
    if (!text.data) continue;

    if (atLineStart) {
      const anchor = lineAnchor(text, container);
      const { parent } = anchor;
      if (parent) insertChild(parent, parent.children.indexOf(anchor), lineno());
    }
    atLineStart = text.data.endsWith("\n");
    spliceAll(text, LINE_START_PATTERN, lineno);
  }
}

// ============================================================================
// Pass
// ============================================================================

function contentContainer(pre: Element): Element {
  const [only] = pre.children;
  if (pre.children.length === 1 && isTag(only) && only.name === "code") {
    return only;
  }
  return pre;
}

export const codeBlocksPass: Pass = {
  name: "code-blocks",

  run(article, ctx) {
    for (const pre of findByName(article.content, ["pre"])) {
      const container = contentContainer(pre);
      normalizeLineEndings(container);
      const options = stripOptionsHeader(container);

      highlight(container, options, article, ctx);
      if (options.linenos) {
        addLineNumbers(container, firstLineNumber(options));
      }

      if (container === pre) {
        const code = createElement("code", {}, [...pre.children]);
        replaceChildren(pre, [code]);
      }
    }
  },
};
