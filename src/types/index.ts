/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  ExportConfig,
  OutputConfig,
  ImagesConfig,
  MathConfig,
  CodeConfig,
  QuoteListsConfig,
  LoggingConfig,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Articles and passes
export type { Article } from "./article";
export type { ArtifactHandle, CodeOptions, Collaborators } from "./collaborators";
export type { Pass, PassContext } from "./pipeline";

// Context
export type { ConfigError, ConversionContext } from "./context";

// Issues
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  MatchIssue,
  ArticleIssue,
  FileIssueReason,
  ResourceIssueReason,
  MatchIssueReason,
  ArticleIssueReason,
  ProcessingStats,
} from "./issues";
