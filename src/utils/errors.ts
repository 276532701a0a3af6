/**
 * Error classes
 * Separates fatal tree defects from recoverable collaborator failures
 */

/**
 * A tree invariant was violated (detached node, cycle, bad splice range).
 * Aborts processing of the current article.
 */
export class StructuralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralError";
  }
}

export type CollaboratorName =
  | "fetchResource"
  | "storeImage"
  | "compileMath"
  | "highlightCode";

/**
 * An external collaborator (network, image store, LaTeX, highlighter) failed.
 * Recoverable: the offending match is left unconverted.
 */
export class CollaboratorError extends Error {
  constructor(
    readonly collaborator: CollaboratorName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

/**
 * Anything escaping a pass, tagged with the pass and article it came from
 */
export class PassError extends Error {
  constructor(
    readonly pass: string,
    readonly articleId: string,
    cause: unknown,
  ) {
    super(
      `Pass "${pass}" failed on article ${articleId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "PassError";
  }

  get structural(): boolean {
    return this.cause instanceof StructuralError;
  }
}
