/**
 * Issue and statistics type definitions
 */

// Type-safe reasons for each issue type
export type FileIssueReason = "read-error" | "parse-error" | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type MatchIssueReason =
  | "fetch-failed"
  | "timeout"
  | "invalid-response"
  | "store-failed"
  | "compile-failed"
  | "highlight-failed";
export type ArticleIssueReason = "structural" | "pass-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

/**
 * A single match left unconverted because a collaborator failed
 */
export interface MatchIssue {
  type: "match";
  article: string; // Article id
  title: string;
  pass: string;
  match: string; // Literal matched text, for manual correction
  reason: MatchIssueReason;
  details: string;
}

/**
 * An article dropped from the issue because a pass aborted
 */
export interface ArticleIssue {
  type: "article";
  article: string;
  title: string;
  pass: string;
  reason: ArticleIssueReason;
  details: string;
}

export type Issue = FileIssue | ResourceIssue | MatchIssue | ArticleIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Article counts
  totalArticles: number;
  processedArticles: number;
  failedArticles: number;

  // Asset counts
  storedImages: number;
  compiledFormulas: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}
