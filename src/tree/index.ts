/**
 * Tree Model exports
 */

export {
  Element,
  Text,
  createElement,
  createText,
  isTag,
  isText,
  parseDocument,
  parseFragment,
} from "./nodes";
export type { AnyNode, ChildNode, Document, ParentNode } from "./nodes";
export {
  insertChild,
  removeNode,
  replaceChildren,
  replaceNode,
  replaceText,
  wrapNode,
} from "./mutations";
export {
  ancestorElements,
  findByName,
  findElements,
  selfAndAncestors,
  textNodes,
} from "./traversal";
export {
  LINK_TAGS,
  VERBATIM_TAGS,
  isProtected,
  isProtectedAny,
} from "./protection";
export type { ProtectionKind } from "./protection";
export { splice, spliceAll, spliceAllAsync } from "./splice";
export type { AsyncMatchBuilder, MatchBuilder } from "./splice";
export { toXml } from "./serialize";
