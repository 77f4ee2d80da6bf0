/**
 * Indexer Module
 * Aggregates rendered articles into the index page and the RSS feed
 */

import path from "node:path";
import { loadTemplates } from "../templates";
import { writeOutput, joinSiteUrl, toHref, toIsoDate } from "../utils";
import type {
  Article,
  BuildContext,
  FeedTemplateContext,
  IndexTemplateContext,
  SiteBuildConfig,
} from "../types";

/**
 * Index page context: every visible article, in scan order
 */
export function buildIndexContext(
  articles: Article[],
  config: SiteBuildConfig,
  now: Date,
): IndexTemplateContext {
  return {
    site: config.site,
    date: toIsoDate(now),
    feed: config.feed.enabled ? toHref(config.feed.filename) : undefined,
    articles: articles
      .filter((article) => !article.hidden)
      .map((article) => ({
        title: article.title,
        description: article.description,
        date: article.date ? toIsoDate(article.date) : undefined,
        href: article.href,
        embedHref: article.embedHref,
      })),
  };
}

/**
 * Feed context: visible articles (up to the configured limit) with absolute links
 */
export function buildFeedContext(
  articles: Article[],
  config: SiteBuildConfig,
  now: Date,
): FeedTemplateContext {
  const visible = articles.filter((article) => !article.hidden);
  const limit = config.feed.limit;
  const items = limit > 0 ? visible.slice(0, limit) : visible;

  return {
    site: config.site,
    lastBuildDate: now.toUTCString(),
    feedUrl: joinSiteUrl(config.site.url, toHref(config.feed.filename)),
    items: items.map((article) => ({
      title: article.title,
      description: article.description,
      link: joinSiteUrl(config.site.url, article.href),
      pubDate: article.date?.toUTCString(),
    })),
  };
}

/**
 * Writes the index page and, when enabled, the feed
 *
 * Reads from context:
 * - articles (processor)
 * - templates (scanner)
 */
export async function indexer(ctx: BuildContext): Promise<void> {
  if (!ctx.articles || !ctx.templates) {
    throw new Error("Processor must run before indexer");
  }

  const { config, articles, tracker, logger } = ctx;
  const templates = await loadTemplates(ctx.templates);
  const outputDir = path.resolve(config.output);
  const now = new Date();

  const indexPath = path.join(outputDir, config.index.filename);
  try {
    await writeOutput(
      indexPath,
      templates.index(buildIndexContext(articles, config, now)),
    );
    tracker.incrementCreatedIndexes();
    logger.debug(`Wrote ${config.index.filename}`);
  } catch (error) {
    tracker.trackError(config.index.filename, error, "file", "write");
  }

  if (!config.feed.enabled) {
    return;
  }

  const feedPath = path.join(outputDir, config.feed.filename);
  try {
    await writeOutput(
      feedPath,
      templates.feed(buildFeedContext(articles, config, now)),
    );
    tracker.incrementCreatedFeeds();
    logger.debug(`Wrote ${config.feed.filename}`);
  } catch (error) {
    tracker.trackError(config.feed.filename, error, "file", "write");
  }
}
