/**
 * Pipeline - Pass orchestrator
 * Runs the pass catalog over one article, strictly one pass after another
 */

import { PASSES } from "./passes";
import { createElement, createText, insertChild } from "./tree";
import type { Article, Pass, PassContext } from "./types";
import { PassError } from "./utils/errors";

/**
 * Append the postscript to the content, after a newline, inside <footer>
 */
export function mergePostscript(article: Article): void {
  const { content, postscript } = article;
  if (!postscript) return;

  const footer = createElement("footer", {}, [...postscript.children]);
  insertChild(content, content.children.length, createText("\n"));
  insertChild(content, content.children.length, footer);
  article.postscript = null;
}

export class Pipeline {
  constructor(private readonly passes: readonly Pass[] = PASSES) {}

  /**
   * Transform the article in place.
   * Anything escaping a pass is rethrown as a PassError; the article should
   * then be dropped.
   */
  async run(article: Article, ctx: PassContext): Promise<Article> {
    mergePostscript(article);

    for (const pass of this.passes) {
      ctx.logger.debug(`Running ${pass.name} on article ${article.id}`);
      try {
        await pass.run(article, ctx);
      } catch (error) {
        throw new PassError(pass.name, article.id, error);
      }
    }

    return article;
  }
}
