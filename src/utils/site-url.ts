import path from "node:path";

/**
 * Join a site-relative href onto the site URL
 *
 * @example
 * joinSiteUrl("https://example.org/blog", "a.html") // "https://example.org/blog/a.html"
 */
export function joinSiteUrl(siteUrl: string, href: string): string {
  const base = siteUrl.endsWith("/") ? siteUrl : `${siteUrl}/`;
  return new URL(href, base).toString();
}

/**
 * Convert a relative filesystem path into a URL path (forward slashes, escaped)
 *
 * @example
 * toHref("notes/first post.html") // "notes/first%20post.html"
 */
export function toHref(relativePath: string): string {
  return relativePath.split(path.sep).map(encodeURIComponent).join("/");
}

/**
 * Relative prefix leading from a page back to the site root
 *
 * @example
 * relativeRoot("a.html") // ""
 * relativeRoot("2024/03/a.html") // "../../"
 */
export function relativeRoot(href: string): string {
  const depth = href.split("/").length - 1;
  return "../".repeat(depth);
}
