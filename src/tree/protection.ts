/**
 * Protected-Region Classifier
 * Decides whether a node sits inside a region that substitution passes must
 * leave alone
 */

import { isTag } from "domhandler";
import type { AnyNode } from "domhandler";
import { selfAndAncestors } from "./traversal";

export type ProtectionKind = "verbatim" | "link";

export const VERBATIM_TAGS: ReadonlySet<string> = new Set(["pre", "code"]);
export const LINK_TAGS: ReadonlySet<string> = new Set(["link"]);

const PROTECTED_TAGS: Record<ProtectionKind, ReadonlySet<string>> = {
  verbatim: VERBATIM_TAGS,
  link: LINK_TAGS,
};

export function isProtected(node: AnyNode, kind: ProtectionKind): boolean {
  const tags = PROTECTED_TAGS[kind];
  for (const current of selfAndAncestors(node)) {
    if (isTag(current) && tags.has(current.name)) return true;
  }
  return false;
}

export function isProtectedAny(
  node: AnyNode,
  kinds: readonly ProtectionKind[],
): boolean {
  return kinds.some((kind) => isProtected(node, kind));
}
