import matter from "gray-matter";
import type { ArticleMetadata } from "../types";

export interface ArticleHeader {
  title: string;
  metadata: ArticleMetadata;
  body: string;
}

const META_LINE = /^([A-Za-z0-9_-]+):\s*(.*)$/;
const META_CONTINUATION = /^ {4,}(.*)$/;
const FRONT_MATTER = /^---\n(?:[\s\S]*?\n)?---(?:\n|$)/;
// "---", "* * *", "___" and friends render as <hr>, never as a title
const THEMATIC_BREAK = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a closed YAML front matter block
 * Returns null when the text only opens with a rule, or the block is not a
 * YAML mapping, so the article is read as plain markdown
 */
function readFrontMatter(text: string): ArticleHeader | null {
  if (!FRONT_MATTER.test(text)) return null;

  let parsed: ReturnType<typeof matter>;
  try {
    parsed = matter(text);
  } catch (error) {
    if (error instanceof Error && error.name === "YAMLException") return null;
    throw error;
  }

  const data: unknown = parsed.data;
  if (!isPlainObject(data)) return null;

  const metadata: ArticleMetadata = { ...data };
  const title = typeof metadata.title === "string" ? metadata.title : "";
  return { title, metadata, body: parsed.content.replace(/^\n+/, "") };
}

/**
 * Read a lone title line: non-empty, followed by an empty line, holding no ':'
 * Returns the title with leading '#' and spaces stripped
 */
function readTitleLine(lines: string[]): string | null {
  if (lines.length < 2) return null;

  const [first, second] = lines;
  if (
    !first.trim() ||
    second.trim() ||
    first.includes(":") ||
    THEMATIC_BREAK.test(first)
  ) {
    return null;
  }

  return first.replace(/^[# ]+/, "").trimEnd();
}

/**
 * Read a leading block of "Key: value" lines
 * Continuation lines (indented four spaces) turn the value into a list
 */
function readMetaBlock(lines: string[]): {
  metadata: ArticleMetadata;
  consumed: number;
} {
  const entries = new Map<string, string[]>();
  let key: string | null = null;
  let index = 0;

  for (; index < lines.length; index++) {
    const line = lines[index];

    if (!line.trim()) {
      // Blank line closes the block (and is swallowed with it)
      if (entries.size > 0) index++;
      break;
    }

    const field = META_LINE.exec(line);
    if (field) {
      key = field[1].toLowerCase();
      entries.set(key, [field[2].trim()]);
      continue;
    }

    const continuation = META_CONTINUATION.exec(line);
    if (continuation && key) {
      entries.get(key)?.push(continuation[1].trim());
      continue;
    }

    break;
  }

  if (entries.size === 0) {
    return { metadata: {}, consumed: 0 };
  }

  const metadata: ArticleMetadata = {};
  for (const [name, values] of entries) {
    metadata[name] = values.length === 1 ? values[0] : values;
  }

  return { metadata, consumed: index };
}

/**
 * Split an article into title, metadata and markdown body
 *
 * 1. YAML front matter (a closed `---` block holding a mapping) when present
 * 2. Otherwise a lone first line followed by a blank line is the title
 * 3. Then a leading "Key: value" metadata block
 *
 * A `title` metadata field wins over the title line.
 */
export function parseArticleHeader(source: string): ArticleHeader {
  const text = source.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");

  const frontMatter = readFrontMatter(text);
  if (frontMatter) return frontMatter;

  let lines = text.split("\n");
  let title = "";

  const titleLine = readTitleLine(lines);
  if (titleLine !== null) {
    title = titleLine;
    lines = lines.slice(2);
  }

  const { metadata, consumed } = readMetaBlock(lines);
  lines = lines.slice(consumed);

  const metaTitle = metadata.title;
  if (typeof metaTitle === "string" && metaTitle) {
    title = metaTitle;
  } else if (Array.isArray(metaTitle) && typeof metaTitle[0] === "string") {
    title = metaTitle[0];
  }

  return { title, metadata, body: lines.join("\n") };
}
