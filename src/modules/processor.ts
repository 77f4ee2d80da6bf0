/**
 * Processor Module
 * Renders markdown files one at a time and writes the page and embedded
 * variants immediately
 */

import { readFile, stat } from "fs/promises";
import path from "node:path";
import { createMarkdownRenderer } from "../markdown";
import { loadTemplates } from "../templates";
import {
  renderArticle,
  embedAssets,
  writeOutput,
  filenameToTitle,
  resolveArticleDate,
  toIsoDate,
  isHiddenArticle,
  relativeRoot,
} from "../utils";
import type {
  Article,
  BuildContext,
  MarkdownFile,
  PageTemplateContext,
} from "../types";

export async function process(ctx: BuildContext): Promise<void> {
  if (!ctx.files || !ctx.templates) {
    throw new Error("Scanner must run before processor");
  }

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, files, tracker, logger } = ctx;
  const templates = await loadTemplates(ctx.templates);
  const renderer = createMarkdownRenderer(config.markdown);
  const inputDir = path.resolve(config.input);

  // ============================================================================
  // Helper Functions
  // ============================================================================

  function buildPageContext(
    file: MarkdownFile,
    article: Article,
    content: string,
  ): PageTemplateContext {
    const root = relativeRoot(file.href);

    return {
      site: config.site,
      title: article.title,
      description: article.description,
      date: article.date ? toIsoDate(article.date) : undefined,
      metadata: article.metadata,
      content,
      root,
      index: `${root}${config.index.filename}`,
      feed: config.feed.enabled ? `${root}${config.feed.filename}` : undefined,
      embedded: false,
    };
  }

  async function embedPage(file: MarkdownFile, html: string): Promise<string> {
    const result = await embedAssets(html, {
      baseDir: path.dirname(file.sourcePath),
      rootDir: inputDir,
      fetchRemote: config.embed.fetchRemote,
      stripScripts: config.embed.stripScripts,
      maxSize: config.embed.maxSize,
      timeout: config.embed.timeout,
      retries: config.embed.retries,
    });

    tracker.incrementImagesInlined(result.inlined);
    for (const { kind, src, error } of result.failures) {
      logger.debug(`${file.relativePath}: unable to inline ${kind} ${src}`);
      tracker.trackError(src, error, "asset");
      if (kind === "image") {
        tracker.incrementImagesFailed();
      } else {
        tracker.incrementStylesheetsFailed();
      }
    }

    return result.html;
  }

  // ============================================================================
  // Main Orchestration
  // ============================================================================

  const markdownFiles = files.filter(
    (file): file is MarkdownFile => file.kind === "markdown",
  );
  const articles: Article[] = [];

  for (const file of markdownFiles) {
    let stage: "read" | "parse" | "write" = "read";

    try {
      // 1. Read source
      const source = await readFile(file.sourcePath, config.files.encoding);
      const { mtime } = await stat(file.sourcePath);

      // 2. Header, markdown, title and preamble
      stage = "parse";
      const rendered = await renderArticle(source, renderer);
      for (const warning of rendered.warnings) {
        tracker.trackArticleIssue(
          file.relativePath,
          warning.reason,
          warning.details,
        );
      }

      const article: Article = {
        title: rendered.title || filenameToTitle(file.stem),
        description: rendered.description,
        date: resolveArticleDate(rendered.metadata.date, mtime),
        href: file.href,
        embedHref: config.embed.enabled ? file.embedHref : undefined,
        hidden: isHiddenArticle(rendered.metadata),
        metadata: rendered.metadata,
      };

      // 3. Page and embedded variants
      const pageContext = buildPageContext(file, article, rendered.html);
      const page = templates.page(pageContext);
      const embed = config.embed.enabled
        ? await embedPage(
            file,
            templates.embed({ ...pageContext, embedded: true }),
          )
        : null;

      // 4. Write
      stage = "write";
      await writeOutput(file.outputPath, page);
      if (embed !== null) {
        await writeOutput(file.embedPath, embed);
        tracker.incrementEmbeddedPages();
      }

      tracker.incrementRendered();
      articles.push(article);
      logger.debug(`Rendered ${file.relativePath} → ${file.href}`);
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", stage);
      tracker.incrementFailed();
    }
  }

  ctx.articles = articles;
}
