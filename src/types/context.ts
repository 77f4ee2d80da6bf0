/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { SiteBuildConfig } from "./config";
import type { Article, SourceFile, TemplateSet } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  AssetIssue,
  ResourceIssue,
  ArticleIssue,
  FileIssueReason,
  AssetIssueReason,
  ResourceIssueReason,
  ArticleIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface BuildContext {
  // Input - provided at initialization
  config: SiteBuildConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;
  logger: Logger;

  files?: SourceFile[]; // All files in scan order (flat list) - primary data structure
  templates?: TemplateSet; // Template overrides found by the scanner
  articles?: Article[]; // Rendered articles, in scan order
  verbose?: boolean;
}

export interface ConfigError {
  path: string;
  error: unknown;
}
