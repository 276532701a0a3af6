/**
 * List Restructurer
 *
 * Layout software knows neither list items nor nested lists. Items are
 * unwrapped into their list with a paragraph break between them, nested
 * lists are renamed by depth (ul2…ul5, ol2…ol3) and the first item of each
 * top-level list is wrapped for its own paragraph style.
 */

import {
  ancestorElements,
  createElement,
  createText,
  findByName,
  isTag,
  replaceChildren,
  wrapNode,
} from "../tree";
import type { ChildNode, Element } from "../tree";
import type { Pass } from "../types";

export type ListFamily = "unordered" | "ordered";

const LIST_FAMILIES: readonly ListFamily[] = ["unordered", "ordered"];

interface FamilyTags {
  base: string;
  maxDepth: number;
}

function familyTags(family: ListFamily): FamilyTags {
  switch (family) {
    case "unordered":
      return { base: "ul", maxDepth: 5 };
    case "ordered":
      return { base: "ol", maxDepth: 3 };
  }
}

/** Tag of a list at `depth`; nesting past the deepest variant reuses it */
export function depthTagName(family: ListFamily, depth: number): string {
  const { base, maxDepth } = familyTags(family);
  return depth < 2 ? base : `${base}${Math.min(depth, maxDepth)}`;
}

function isFamilyTag(family: ListFamily, name: string): boolean {
  const { base, maxDepth } = familyTags(family);
  if (name === base) return true;
  const depth = name.startsWith(base) ? Number(name.slice(base.length)) : NaN;
  return Number.isInteger(depth) && depth >= 2 && depth <= maxDepth;
}

/** Same-family list ancestors plus one */
export function listDepth(list: Element, family: ListFamily): number {
  return ancestorElements(list).filter((el) => isFamilyTag(family, el.name)).length + 1;
}

/**
 * Unwrap the items of `list`: item content moves up, text between items is
 * dropped and a newline separates consecutive items
 */
export function flattenList(list: Element): void {
  const flattened: ChildNode[] = [];
  for (const child of [...list.children]) {
    if (!isTag(child)) continue;
    if (child.name === "li") {
      flattened.push(...child.children);
    } else {
      flattened.push(child);
    }
    flattened.push(createText("\n"));
  }
  flattened.pop();
  replaceChildren(list, flattened);
}

export const listsPass: Pass = {
  name: "lists",

  run(article, ctx) {
    for (const list of findByName(article.content, ["ul", "ol", ctx.quoteLists.tag])) {
      flattenList(list);
    }

    for (const family of LIST_FAMILIES) {
      const { base } = familyTags(family);
      for (const list of findByName(article.content, [base])) {
        const depth = listDepth(list, family);
        list.name = depthTagName(family, depth);

        const [first] = list.children;
        if (depth === 1 && first) {
          wrapNode(first, createElement(`${base}_first`));
        }
      }
    }
  },
};
