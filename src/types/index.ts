/**
 * Central type exports
 */

// Configuration
export type {
  SiteBuildConfig,
  PartialSiteBuildConfig,
  SiteConfig,
  FilesConfig,
  MarkdownConfig,
  EmbedConfig,
  FeedConfig,
  IndexConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  SiteBuildConfigSchema,
  PartialSiteBuildConfigSchema,
} from "./config";

// Files
export type {
  ArticleMetadata,
  MarkdownFile,
  AssetFile,
  SourceFile,
  TemplateSet,
  Article,
  SiteTemplateContext,
  PageTemplateContext,
  IndexTemplateContext,
  FeedTemplateContext,
} from "./files";

// Context
export type {
  BuildContext,
  ConfigError,
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
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
