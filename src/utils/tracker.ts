/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "node:path";
import { ZodError } from "zod";
import { CollaboratorError, PassError } from "./errors";
import type { Article } from "../types/article";
import type {
  ArticleIssue,
  FileIssueReason,
  Issue,
  IssueType,
  MatchIssue,
  MatchIssueReason,
  ProcessingStats,
  ResourceIssueReason,
} from "../types/issues";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function detailsOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: detailsOf(error) };
}

function mapFileError(
  error: unknown,
  context: "read" | "parse" | "write",
): IssueInfo<FileIssueReason> {
  const details = detailsOf(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "read-error", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return {
        reason: context === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  switch (context) {
    case "read":
      return { reason: "read-error", details };
    case "parse":
      return { reason: "parse-error", details };
    case "write":
      return { reason: "write-error", details };
  }
}

function mapFetchError(error: CollaboratorError): MatchIssueReason {
  const { cause } = error;
  if (cause instanceof Error && cause.name === "AbortError") {
    return "timeout";
  }
  if (error.message.startsWith("HTTP ")) {
    return "invalid-response";
  }
  return "fetch-failed";
}

function mapMatchError(error: unknown): IssueInfo<MatchIssueReason> {
  const details = detailsOf(error);
  if (!(error instanceof CollaboratorError)) {
    return { reason: "fetch-failed", details };
  }
  switch (error.collaborator) {
    case "fetchResource":
      return { reason: mapFetchError(error), details };
    case "storeImage":
      return { reason: "store-failed", details };
    case "compileMath":
      return { reason: "compile-failed", details };
    case "highlightCode":
      return { reason: "highlight-failed", details };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalArticles = 0;
  private processedArticles = 0;
  private failedArticles = 0;
  private storedImages = 0;
  private compiledFormulas = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalArticles(count: number): void {
    this.totalArticles = count;
  }

  incrementProcessed(): void {
    this.processedArticles++;
  }

  incrementFailed(): void {
    this.failedArticles++;
  }

  incrementImagesStored(): void {
    this.storedImages++;
  }

  incrementFormulasCompiled(): void {
    this.compiledFormulas++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context: "read" | "parse" | "write" = "parse",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  /**
   * Track a match left unconverted after a collaborator failure
   */
  trackMatchIssue(
    article: Article,
    pass: string,
    match: string,
    error: unknown,
  ): MatchIssue {
    const { reason, details } = mapMatchError(error);
    const issue: MatchIssue = {
      type: "match",
      article: article.id,
      title: article.title,
      pass,
      match,
      reason,
      details,
    };
    this.issues.push(issue);
    return issue;
  }

  /**
   * Track an article dropped after a pass aborted
   */
  trackArticleIssue(article: Article, error: PassError): ArticleIssue {
    const issue: ArticleIssue = {
      type: "article",
      article: article.id,
      title: article.title,
      pass: error.pass,
      reason: error.structural ? "structural" : "pass-error",
      details: error.message,
    };
    this.issues.push(issue);
    return issue;
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalArticles: this.totalArticles,
      processedArticles: this.processedArticles,
      failedArticles: this.failedArticles,
      storedImages: this.storedImages,
      compiledFormulas: this.compiledFormulas,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  /**
   * Write the stats and every issue as JSON, so unconverted matches can be
   * fixed in the source before the next run
   */
  async exportStats(outputPath: string): Promise<void> {
    const { issues, ...summary } = this.getStats();
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(
      outputPath,
      JSON.stringify({ summary, issues }, null, 2),
      "utf-8",
    );
  }
}
