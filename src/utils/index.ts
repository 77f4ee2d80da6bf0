/**
 * Utility exports
 */

// Article utilities
export { parseArticleHeader } from "./parse-article-header";
export type { ArticleHeader } from "./parse-article-header";
export { structureArticle } from "./structure-article";
export type { StructuredArticle, TitleWarning } from "./structure-article";
export { renderArticle } from "./render-article";
export type { RenderedArticle } from "./render-article";
export { resolveArticleDate, toIsoDate } from "./resolve-article-date";
export { isHiddenArticle } from "./is-hidden-article";

// Embedding utilities
export { embedAssets } from "./embed-assets";
export type { EmbedOptions, EmbedResult, EmbedFailure } from "./embed-assets";
export { fetchAsset } from "./fetch-asset";
export type { FetchAssetOptions, FetchedAsset } from "./fetch-asset";
export { toDataUri, mimeTypeFor, fileToDataUri } from "./data-uri";
export { AssetError, OutputConflictError } from "./errors";

// Path/URL utilities
export { filenameToTitle } from "./filename-to-title";
export { joinSiteUrl, toHref, relativeRoot } from "./site-url";

// Filesystem utilities
export { pathKind, writeOutput } from "./fs";
export type { PathKind } from "./fs";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
