import { load } from "cheerio";
import type { ArticleIssueReason } from "../types";

export interface TitleWarning {
  reason: ArticleIssueReason;
  details?: string;
}

export interface StructuredArticle {
  html: string;
  title: string;
  description: string;
  warnings: TitleWarning[];
}

/**
 * Settle the article title against the rendered HTML and mark the preamble
 *
 * - A leading <h1> is the title (and wins over a title from the header)
 * - A later top-level <h1> is disregarded; the known title is put on top
 * - With no <h1>, the known title is inserted as one
 * - The first top-level paragraph is the preamble (article description)
 */
export function structureArticle(
  html: string,
  knownTitle: string,
): StructuredArticle {
  const $ = load(html, null, false);
  const root = $.root();
  const warnings: TitleWarning[] = [];
  let title = knownTitle;

  const insertTitle = (text: string) => {
    root.prepend($("<h1></h1>").text(text), "\n");
  };

  const h1 = root.children("h1").first();
  if (h1.length === 0) {
    if (title) {
      insertTitle(title);
    } else {
      warnings.push({ reason: "no-title" });
    }
  } else if (!root.children().first().is(h1)) {
    warnings.push({ reason: "late-title", details: h1.text().trim() });
    if (title) {
      insertTitle(title);
    }
  } else {
    const headingTitle = h1.text().trim();
    if (title && title !== headingTitle) {
      warnings.push({ reason: "duplicate-title", details: headingTitle });
    }
    title = headingTitle;
  }

  let description = "";
  const preamble = root.children("p").first();
  if (preamble.length > 0) {
    description = preamble.text().trim();
    preamble.addClass("article_preamble");
  }

  return { html: $.html(), title, description, warnings };
}
