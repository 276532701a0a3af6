/**
 * Pass pipeline type definitions
 */

import type { Article } from "./article";
import type { Collaborators } from "./collaborators";
import type { QuoteListsConfig } from "./config";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

/**
 * Shared by every pass on every article; holds no per-article state
 */
export interface PassContext {
  collaborators: Collaborators;
  logger: Logger;
  tracker: Tracker;
  quoteLists: QuoteListsConfig;
}

/**
 * One stage of the pipeline. A pass mutates the article tree in place and
 * creates any state it needs afresh on every call.
 */
export interface Pass {
  readonly name: string;
  run(article: Article, ctx: PassContext): void | Promise<void>;
}
