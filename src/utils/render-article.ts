import type { MarkdownRenderer } from "../markdown";
import type { ArticleMetadata } from "../types";
import { parseArticleHeader } from "./parse-article-header";
import { structureArticle, type TitleWarning } from "./structure-article";

export interface RenderedArticle {
  html: string;
  title: string;
  description: string;
  metadata: ArticleMetadata;
  warnings: TitleWarning[];
}

/**
 * Header → markdown → structured HTML for a single article source
 */
export async function renderArticle(
  source: string,
  renderer: MarkdownRenderer,
): Promise<RenderedArticle> {
  const { title, metadata, body } = parseArticleHeader(source);
  const html = await renderer.render(body);
  return { ...structureArticle(html, title), metadata };
}
