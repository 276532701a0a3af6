/**
 * Conversion context - flows through the entire CLI pipeline
 * Each module reads what it needs and writes its results back
 */

import type { Article } from "./article";
import type { ConversionConfig } from "./config";
import type { Collaborators } from "./collaborators";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export interface ConfigError {
  path: string;
  error: unknown;
}

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  issue: string; // Issue tag, e.g. "v141i3"
  exportPath: string; // Export file or directory of export files

  logger: Logger;
  tracker: Tracker;
  collaborators: Collaborators;
  verbose?: boolean;

  exportFiles?: string[]; // Scanner fills: export files, sorted
  articles?: Article[]; // Importer fills: articles selected for the issue
  processed?: Article[]; // Processor fills: articles that went through every pass
}
