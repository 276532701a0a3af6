/**
 * Utility exports
 */

// Asset locations
export { getArticleSlug, getImageLocation, getPdfLocation } from "./article-paths";

// Highlight roles
export { SYNTAX_HIGHLIGHT_TYPES, getSyntaxHighlightTagName } from "./syntax-highlight";
export type { SyntaxHighlightType } from "./syntax-highlight";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig, mergeConfig } from "./load-config";

// Errors, logging and tracking
export { CollaboratorError, PassError, StructuralError } from "./errors";
export type { CollaboratorName } from "./errors";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./tracker";
