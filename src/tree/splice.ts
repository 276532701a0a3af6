/**
 * Span Splicer
 * Replaces a matched substring of a text node with an element, in place
 */

import type { ChildNode, Text } from "domhandler";
import { StructuralError } from "../utils/errors";
import { createText } from "./nodes";
import { replaceNode } from "./mutations";

/**
 * Replace `text.data.slice(start, end)` with `replacement`.
 *
 * The text node is swapped for `[prefix, replacement, suffix]`, leaving out
 * empty pieces. Returns the suffix node so scanning can continue after the
 * match, or `null` when nothing follows it.
 */
export function splice(
  text: Text,
  start: number,
  end: number,
  replacement: ChildNode,
): Text | null {
  const content = text.data;
  if (start < 0 || end < start || end > content.length) {
    throw new StructuralError(
      `Splice range ${start}..${end} is outside a text of length ${content.length}`,
    );
  }

  const prefix = content.slice(0, start);
  const suffix = content.slice(end);
  const suffixNode = suffix ? createText(suffix) : null;

  const nodes: ChildNode[] = [];
  if (prefix) nodes.push(createText(prefix));
  nodes.push(replacement);
  if (suffixNode) nodes.push(suffixNode);

  replaceNode(text, nodes);
  return suffixNode;
}

/**
 * Builds the element for one match, or returns null to keep the match as text
 */
export type MatchBuilder = (match: RegExpExecArray) => ChildNode | null;
export type AsyncMatchBuilder = (
  match: RegExpExecArray,
) => Promise<ChildNode | null>;

function globalPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

/**
 * Every match of `pattern` in `source`, zero-width matches included
 */
function collectMatches(source: string, pattern: RegExp): RegExpExecArray[] {
  const regex = globalPattern(pattern);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(source)) !== null) {
    matches.push(match);
    if (match[0] === "") regex.lastIndex++;
  }
  return matches;
}

/**
 * Tracks where the unspliced remainder of the original string lives
 */
class Continuation {
  private consumed = 0;

  constructor(private current: Text | null) {}

  get done(): boolean {
    return this.current === null;
  }

  apply(match: RegExpExecArray, node: ChildNode): void {
    if (!this.current) return;
    const start = match.index - this.consumed;
    const end = start + match[0].length;
    this.current = splice(this.current, start, end, node);
    this.consumed = match.index + match[0].length;
  }
}

/**
 * Splice an element over every match of `pattern` in `text`.
 * Matches are found in the original string, so elements inserted by earlier
 * matches are never rescanned.
 */
export function spliceAll(text: Text, pattern: RegExp, build: MatchBuilder): void {
  const continuation = new Continuation(text);
  for (const match of collectMatches(text.data, pattern)) {
    if (continuation.done) break;
    const node = build(match);
    if (node) continuation.apply(match, node);
  }
}

export async function spliceAllAsync(
  text: Text,
  pattern: RegExp,
  build: AsyncMatchBuilder,
): Promise<void> {
  const continuation = new Continuation(text);
  for (const match of collectMatches(text.data, pattern)) {
    if (continuation.done) break;
    const node = await build(match);
    if (node) continuation.apply(match, node);
  }
}
