/**
 * Tree Nodes
 * Node construction and parsing on top of domhandler
 */

import { load } from "cheerio";
import { Element, Text, isTag, isText } from "domhandler";
import type { ChildNode, Document } from "domhandler";
import { appendChild, removeElement } from "domutils";

export { Element, Text, isTag, isText };
export type { AnyNode, ChildNode, Document, ParentNode } from "domhandler";

/**
 * Create a detached element, adopting the given children in order
 */
export function createElement(
  name: string,
  attribs: Record<string, string> = {},
  children: ChildNode[] = [],
): Element {
  const element = new Element(name, { ...attribs });
  for (const child of children) {
    appendChild(element, child);
  }
  return element;
}

export function createText(data: string): Text {
  return new Text(data);
}

/**
 * Parse loosely-structured article markup into a document root.
 * Uses htmlparser2 (not parse5) so that unknown and misplaced tags such as
 * <caption>, <em2> or <imath> survive exactly where the author put them.
 */
export function parseDocument(markup: string): Document {
  const $ = load(markup, { xml: { xmlMode: false, decodeEntities: true } }, false);
  return $.root()[0];
}

/**
 * Parse markup into detached nodes, ready to be inserted elsewhere
 */
export function parseFragment(markup: string): ChildNode[] {
  const root = parseDocument(markup);
  const nodes = [...root.children];
  for (const node of nodes) {
    removeElement(node);
  }
  return nodes;
}
