const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_TIME = /\d:\d/;

/**
 * Parse a date string; a calendar day without a time ("March 1, 2024")
 * is pinned to UTC midnight, like ISO days are
 */
function parseDateString(value: string): Date | undefined {
  const text = value.trim();
  const parsed = new Date(text);
  if (Number.isNaN(parsed.getTime())) return undefined;
  if (ISO_DAY.test(text) || HAS_TIME.test(text)) return parsed;

  return new Date(
    Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()),
  );
}

/**
 * Resolve an article date from its metadata, falling back to the file's
 * modification time
 *
 * @example
 * resolveArticleDate("2024-03-01", mtime) // 2024-03-01T00:00:00.000Z
 * resolveArticleDate(undefined, mtime) // mtime
 */
export function resolveArticleDate(value: unknown, fallback?: Date): Date | undefined {
  // Metadata blocks yield lists for multi-line values
  const candidate: unknown = Array.isArray(value) ? value[0] : value;

  if (candidate instanceof Date && !Number.isNaN(candidate.getTime())) {
    return candidate;
  }

  if (typeof candidate === "number") {
    const parsed = new Date(candidate);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  if (typeof candidate === "string") {
    const parsed = parseDateString(candidate);
    if (parsed) {
      return parsed;
    }
  }

  return fallback;
}

/**
 * Format a date as YYYY-MM-DD
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().split("T")[0];
}
