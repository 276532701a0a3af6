/**
 * Tree Traversal
 * Snapshot queries; every result is a fresh array so callers may mutate the
 * tree while iterating it
 */

import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element, ParentNode, Text } from "domhandler";
import { findAll } from "domutils";

/**
 * All text nodes below `root`, in document order
 */
export function textNodes(root: AnyNode): Text[] {
  const result: Text[] = [];

  function visit(node: AnyNode): void {
    if (isText(node)) {
      result.push(node);
    } else if (hasChildren(node)) {
      for (const child of node.children) visit(child);
    }
  }

  visit(root);
  return result;
}

/**
 * Elements below `root` matching the predicate, in document order
 */
export function findElements(
  root: ParentNode,
  predicate: (element: Element) => boolean,
): Element[] {
  return findAll(predicate, root.children);
}

/**
 * Elements below `root` whose tag is one of `names`
 */
export function findByName(root: ParentNode, names: Iterable<string>): Element[] {
  const wanted = new Set(names);
  return findElements(root, (element) => wanted.has(element.name));
}

/**
 * The node itself followed by every ancestor up to the root
 */
export function* selfAndAncestors(node: AnyNode): Generator<AnyNode> {
  let current: AnyNode | null = node;
  while (current) {
    yield current;
    current = current.parent;
  }
}

/**
 * Ancestor elements, nearest first
 */
export function ancestorElements(node: AnyNode): Element[] {
  const result: Element[] = [];
  for (let current = node.parent; current; current = current.parent) {
    if (isTag(current)) result.push(current);
  }
  return result;
}
