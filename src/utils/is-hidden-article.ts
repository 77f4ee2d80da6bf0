import type { ArticleMetadata } from "../types";

const VISIBLE_VALUES = new Set(["false", "no", "0"]);

/**
 * An article is hidden when its metadata carries a `hidden` key, unless the
 * value explicitly says otherwise (false, "false", "no", "0")
 */
export function isHiddenArticle(metadata: ArticleMetadata): boolean {
  if (!("hidden" in metadata)) return false;

  const value = metadata.hidden;
  if (value === false || value === 0) return false;
  if (typeof value === "string") {
    return !VISIBLE_VALUES.has(value.trim().toLowerCase());
  }

  return true;
}
