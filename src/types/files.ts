/**
 * File-related type definitions
 */

export type ArticleMetadata = Record<string, unknown>;

interface BaseDescriptor {
  sourcePath: string; // Absolute path to the source file
  relativePath: string; // Relative path from input root
  outputPath: string; // Absolute target path
}

export interface MarkdownFile extends BaseDescriptor {
  kind: "markdown";
  stem: string; // Filename without the markdown extension
  href: string; // Page URL relative to the site root (e.g., "2024/notes.html")
  embedPath: string; // Absolute target path of the embedded rendering
  embedHref: string;
}

export interface AssetFile extends BaseDescriptor {
  kind: "asset";
}

export type SourceFile = MarkdownFile | AssetFile;

/**
 * Template file paths
 * Null means use built-in default template
 */
export interface TemplateSet {
  directory: string; // Base directory for includeFile/includeImage helpers
  page: string | null; // Path to page.html.hbs
  embed: string | null; // Path to embed.html.hbs
  index: string | null; // Path to index.html.hbs
  feed: string | null; // Path to feed.xml.hbs
}

export interface Article {
  title: string;
  description: string;
  date?: Date;
  href: string;
  embedHref?: string;
  hidden: boolean;
  metadata: ArticleMetadata;
}

// ============================================================================
// Template Context Types
// ============================================================================

export interface SiteTemplateContext {
  title: string;
  description: string;
  url: string;
  language: string;
}

/**
 * Context passed to page and embed templates
 */
export interface PageTemplateContext {
  site: SiteTemplateContext;
  title: string;
  description: string;
  date?: string; // YYYY-MM-DD
  metadata: ArticleMetadata;
  content: string; // Rendered article HTML
  root: string; // Relative path from the page back to the site root ("" or "../")
  index: string; // Relative link to the index page
  feed?: string; // Relative link to the feed, when one is generated
  embedded: boolean;
}

/**
 * Context passed to the index template
 */
export interface IndexTemplateContext {
  site: SiteTemplateContext;
  date: string;
  feed?: string;
  articles: Array<{
    title: string;
    description: string;
    date?: string;
    href: string;
    embedHref?: string;
  }>;
}

/**
 * Context passed to the feed template
 */
export interface FeedTemplateContext {
  site: SiteTemplateContext;
  lastBuildDate: string;
  feedUrl: string;
  items: Array<{
    title: string;
    description: string;
    link: string;
    pubDate?: string;
  }>;
}
