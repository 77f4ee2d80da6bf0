/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SiteConfigSchema = z.object({
  title: z.string(),
  description: z.string(),
  // Absolute URL the site is served from, used for feed links
  url: z.url(),
  language: z.string(),
});

export const FilesConfigSchema = z.object({
  // Extensions (lower-case, with dot) treated as markdown; "" matches files without one
  markdownExtensions: z.array(z.string()),
  sort: z.enum(["asc", "desc"]),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]),
});

export const MarkdownConfigSchema = z.object({
  gfm: z.boolean(),
  breaks: z.boolean(),
  highlight: z.boolean(),
  guessLanguage: z.boolean(),
});

export const EmbedConfigSchema = z.object({
  enabled: z.boolean(),
  suffix: z.string(),
  fetchRemote: z.boolean(),
  stripScripts: z.boolean(),
  maxSize: z.number().int().positive(), // In bytes (default: 10MB)
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
});

export const FeedConfigSchema = z.object({
  enabled: z.boolean(),
  filename: z.string().min(1),
  // Maximum number of items, 0 keeps every article
  limit: z.number().int().nonnegative(),
});

export const IndexConfigSchema = z.object({
  filename: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const SiteBuildConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  // Directory holding template overrides; null looks in the input root
  templates: z.string().nullable(),
  site: SiteConfigSchema,
  files: FilesConfigSchema,
  markdown: MarkdownConfigSchema,
  embed: EmbedConfigSchema,
  feed: FeedConfigSchema,
  index: IndexConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialSiteBuildConfigSchema = SiteBuildConfigSchema.partial().extend({
  site: SiteConfigSchema.partial().optional(),
  files: FilesConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  embed: EmbedConfigSchema.partial().optional(),
  feed: FeedConfigSchema.partial().optional(),
  index: IndexConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type EmbedConfig = z.infer<typeof EmbedConfigSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type SiteBuildConfig = z.infer<typeof SiteBuildConfigSchema>;
export type PartialSiteBuildConfig = z.infer<typeof PartialSiteBuildConfigSchema>;
