/**
 * Processor Module
 * Runs the pass pipeline over every article, one article at a time
 */

import { Pipeline } from "../pipeline";
import type { Article, ConversionContext, PassContext } from "../types";
import { PassError } from "../utils/errors";

/**
 * An article whose pipeline aborts is dropped from the issue; the others go
 * on regardless
 *
 * Reads from context:
 * - articles
 *
 * Writes to context:
 * - processed: articles that went through every pass
 */
export async function process(
  ctx: ConversionContext,
  pipeline: Pipeline = new Pipeline(),
): Promise<void> {
  if (!ctx.articles) {
    throw new Error("Importer must run before processor");
  }

  const { collaborators, config, logger, tracker } = ctx;
  const passCtx: PassContext = {
    collaborators,
    logger,
    tracker,
    quoteLists: config.quoteLists,
  };

  const processed: Article[] = [];
  for (const article of ctx.articles) {
    try {
      await pipeline.run(article, passCtx);
      processed.push(article);
      tracker.incrementProcessed();
    } catch (error) {
      if (!(error instanceof PassError)) throw error;

      tracker.incrementFailed();
      const issue = tracker.trackArticleIssue(article, error);
      logger.error(
        `Dropped article ${article.id} ("${article.title}"): ${issue.reason} failure in ${issue.pass}`,
        error.cause,
      );
    }
  }

  ctx.processed = processed;
}
