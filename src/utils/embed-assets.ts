/**
 * Embedder
 * Turns a rendered page into a self-contained document: images become data
 * URIs, local stylesheets are inlined and scripts are dropped
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { load } from "cheerio";
import { fetchAsset } from "./fetch-asset";
import { mimeTypeFor, toDataUri } from "./data-uri";
import { AssetError } from "./errors";

export interface EmbedOptions {
  baseDir: string; // Directory relative sources resolve against
  rootDir: string; // Directory root-relative ("/...") sources resolve against
  fragment?: boolean; // Treat the input as a fragment rather than a document
  fetchRemote: boolean;
  stripScripts: boolean;
  maxSize: number;
  timeout: number;
  retries: number;
}

export interface EmbedFailure {
  kind: "image" | "stylesheet";
  src: string;
  error: unknown;
}

export interface EmbedResult {
  html: string;
  inlined: number;
  failures: EmbedFailure[];
}

const REMOTE_URL = /^(?:https?:)?\/\//i;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

interface LoadedAsset {
  content: Buffer;
  mimeType: string;
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value; // Malformed escapes: use the path as written
  }
}

function resolveLocalPath(src: string, options: EmbedOptions): string {
  const decoded = decodePath(src.split(/[?#]/)[0]);

  return decoded.startsWith("/")
    ? path.join(options.rootDir, decoded)
    : path.resolve(options.baseDir, decoded);
}

async function loadImage(
  src: string,
  options: EmbedOptions,
): Promise<LoadedAsset> {
  if (REMOTE_URL.test(src)) {
    const url = src.startsWith("//") ? `https:${src}` : src;
    const { content, mimeType } = await fetchAsset(url, options);
    return {
      content,
      mimeType: mimeType ?? mimeTypeFor(new URL(url).pathname),
    };
  }

  const localPath = resolveLocalPath(src, options);
  const mimeType = mimeTypeFor(localPath);
  return { content: await readFile(localPath), mimeType };
}

/**
 * Decide whether an image source should be inlined
 */
function shouldInline(src: string, options: EmbedOptions): boolean {
  if (!src || src.startsWith("data:")) return false;
  if (REMOTE_URL.test(src)) return options.fetchRemote;
  return !URL_SCHEME.test(src);
}

export async function embedAssets(
  html: string,
  options: EmbedOptions,
): Promise<EmbedResult> {
  const $ = load(html, null, !options.fragment);
  const failures: EmbedFailure[] = [];
  let inlined = 0;

  for (const element of $("img").toArray()) {
    const $img = $(element);
    const src = $img.attr("src")?.trim() ?? "";
    if (!shouldInline(src, options)) continue;

    try {
      const { content, mimeType } = await loadImage(src, options);
      if (content.length > options.maxSize) {
        throw new AssetError(
          `${src} is ${content.length} bytes (limit ${options.maxSize})`,
          "too-large",
        );
      }
      $img.attr("src", toDataUri(content, mimeType));
      inlined++;
    } catch (error) {
      failures.push({ kind: "image", src, error });
    }
  }

  for (const element of $('link[rel="stylesheet"][href]').toArray()) {
    const $link = $(element);
    const href = $link.attr("href") ?? "";
    if (URL_SCHEME.test(href) || REMOTE_URL.test(href)) continue;

    try {
      const css = await readFile(resolveLocalPath(href, options), "utf-8");
      $link.replaceWith($("<style></style>").text(css));
    } catch (error) {
      failures.push({ kind: "stylesheet", src: href, error });
    }
  }

  if (options.stripScripts) {
    $("script").remove();
  }

  return { html: $.html(), inlined, failures };
}
