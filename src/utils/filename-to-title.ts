/**
 * Convert a filename to a readable title
 * Removes a date or numeric prefix, splits by hyphens/underscores/dots, and
 * capitalizes each word
 *
 * @example
 * filenameToTitle("2024-03-01-first-post") // "First Post"
 * filenameToTitle("01-introduction") // "Introduction"
 * filenameToTitle("notes_on.vim") // "Notes On Vim"
 */
export function filenameToTitle(filename: string): string {
  return filename
    .replace(/^(?:\d{4}-\d{2}-\d{2}|\d+)[-_]/, "")
    .split(/[-_.\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
