/**
 * Shared pass helpers
 */

import { isProtectedAny, replaceText, textNodes } from "../tree";
import type { ParentNode, ProtectionKind, Text } from "../tree";
import type { Article, PassContext } from "../types";

/**
 * Unprotected text nodes of `root`, snapshotted before any edit
 */
export function editableText(
  root: ParentNode,
  protect: readonly ProtectionKind[],
): Text[] {
  return textNodes(root).filter((node) => !isProtectedAny(node, protect));
}

/**
 * Apply a string rewrite to every unprotected text node, replacing only the
 * nodes whose payload actually changes. Returns the number of changed nodes.
 */
export function rewriteText(
  root: ParentNode,
  protect: readonly ProtectionKind[],
  rewrite: (data: string, node: Text) => string,
): number {
  let changed = 0;
  for (const node of editableText(root, protect)) {
    const data = rewrite(node.data, node);
    if (data !== node.data) {
      replaceText(node, data);
      changed++;
    }
  }
  return changed;
}

/**
 * Report a match left unconverted after a collaborator failure
 */
export function reportFailure(
  ctx: PassContext,
  article: Article,
  pass: string,
  match: string,
  error: unknown,
): void {
  const issue = ctx.tracker.trackMatchIssue(article, pass, match, error);
  ctx.logger.warn(
    `[${pass}] Left "${match}" unconverted in article ${article.id} ("${article.title}"): ${issue.details}`,
  );
}
