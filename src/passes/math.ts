/**
 * LaTeX formulas
 * `\(…\)` and `\[…\]` are compiled to PDF and replaced by a link to the file
 */

import { createHash } from "node:crypto";
import { createElement, spliceAllAsync } from "../tree";
import type { ArtifactHandle, Pass } from "../types";
import { getPdfLocation } from "../utils/article-paths";
import { editableText, reportFailure } from "./helpers";

export const MATH_PATTERN = /\\[([]([\s\S]+?)\\[)\]]/;

/**
 * Per-article compile memo. A source that failed once is not retried, and
 * a formula written twice is compiled once.
 */
export class MathState {
  private readonly validity = new Map<string, boolean>();
  private readonly artifacts = new Map<string, ArtifactHandle>();

  isKnownInvalid(source: string): boolean {
    return this.validity.get(source) === false;
  }

  artifact(literal: string): ArtifactHandle | undefined {
    return this.artifacts.get(literal);
  }

  recordCompiled(source: string, literal: string, handle: ArtifactHandle): void {
    this.validity.set(source, true);
    this.artifacts.set(literal, handle);
  }

  recordInvalid(source: string): void {
    this.validity.set(source, false);
  }
}

/** Hash of the literal match, used as the artifact file name */
export function formulaHash(literal: string): string {
  return createHash("sha1").update(literal, "utf8").digest("hex");
}

export const mathPass: Pass = {
  name: "math",

  async run(article, ctx) {
    const state = new MathState();

    for (const text of editableText(article.content, ["verbatim"])) {
      await spliceAllAsync(text, MATH_PATTERN, async (match) => {
        const [literal, source] = match;
        if (state.isKnownInvalid(source)) return null;

        let handle = state.artifact(literal);
        if (!handle) {
          const displayMode = literal[1] === "[";
          const location = getPdfLocation(article, formulaHash(literal));
          try {
            handle = await ctx.collaborators.compileMath(source, displayMode, location);
          } catch (error) {
            state.recordInvalid(source);
            reportFailure(ctx, article, mathPass.name, literal, error);
            return null;
          }
          state.recordCompiled(source, literal, handle);
          ctx.tracker.incrementFormulasCompiled();
          ctx.logger.debug(`${location}\t${source}`);
        }

        return createElement("link", { href: handle.href });
      });
    }
  },
};
