/**
 * Tree Mutations
 * Every structural edit goes through here so parent and sibling links stay
 * consistent and no node ever ends up inside itself
 */

import { hasChildren } from "domhandler";
import type { ChildNode, Element, ParentNode, Text } from "domhandler";
import { appendChild, prepend, removeElement } from "domutils";
import { StructuralError } from "../utils/errors";
import { createText } from "./nodes";
import { selfAndAncestors } from "./traversal";

function assertNotInside(node: ChildNode, parent: ParentNode): void {
  if (!hasChildren(node)) return;
  for (const ancestor of selfAndAncestors(parent)) {
    if (ancestor === node) {
      throw new StructuralError(
        `Cannot insert <${describe(node)}> into itself or one of its descendants`,
      );
    }
  }
}

function attachedParent(node: ChildNode): ParentNode {
  const { parent } = node;
  if (!parent || !parent.children.includes(node)) {
    throw new StructuralError(`<${describe(node)}> is not attached to a parent`);
  }
  return parent;
}

function describe(node: ChildNode | ParentNode): string {
  return "name" in node ? node.name : node.type;
}

/**
 * Insert `node` so that it becomes child number `index` of `parent`.
 * The node is detached from its previous position first.
 */
export function insertChild(parent: ParentNode, index: number, node: ChildNode): void {
  assertNotInside(node, parent);

  const reference = parent.children[index];
  if (reference === node) return;

  removeElement(node);
  if (reference) {
    prepend(reference, node);
  } else {
    appendChild(parent, node);
  }
}

export function removeNode(node: ChildNode): void {
  removeElement(node);
}

/**
 * Replace `node` with `replacements`, in order
 */
export function replaceNode(node: ChildNode, replacements: ChildNode[]): void {
  const parent = attachedParent(node);

  for (const replacement of replacements) {
    if (replacement === node) {
      throw new StructuralError("A node cannot be part of its own replacement");
    }
    assertNotInside(replacement, parent);
  }

  for (const replacement of replacements) {
    prepend(node, replacement);
  }
  removeElement(node);
}

/**
 * Swap a text node for a new one carrying `data`. Text payloads are never
 * edited in place, so snapshots of the old node keep their content.
 */
export function replaceText(node: Text, data: string): Text {
  const replacement = createText(data);
  replaceNode(node, [replacement]);
  return replacement;
}

/**
 * Make `nodes` the complete child list of `parent`
 */
export function replaceChildren(parent: ParentNode, nodes: ChildNode[]): void {
  for (const node of nodes) {
    assertNotInside(node, parent);
  }
  for (const child of [...parent.children]) {
    removeElement(child);
  }
  for (const node of nodes) {
    appendChild(parent, node);
  }
}

/**
 * Put `wrapper` where `node` was and move `node` inside it, as its last child
 */
export function wrapNode(node: ChildNode, wrapper: Element): Element {
  const parent = attachedParent(node);
  if (wrapper === node) {
    throw new StructuralError("A node cannot wrap itself");
  }
  assertNotInside(wrapper, parent);
  prepend(node, wrapper);
  appendChild(wrapper, node);
  return wrapper;
}
