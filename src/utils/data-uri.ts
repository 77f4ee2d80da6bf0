import { readFileSync } from "fs";
import { lookup } from "mime-types";
import { AssetError } from "./errors";

/**
 * Build a base64 data URI
 *
 * @example
 * toDataUri(Buffer.from("hi"), "text/plain") // "data:text/plain;base64,aGk="
 */
export function toDataUri(content: Buffer, mimeType: string): string {
  return `data:${mimeType};base64,${content.toString("base64")}`;
}

/**
 * Guess a MIME type from a file name, failing with an AssetError when unknown
 */
export function mimeTypeFor(path: string): string {
  const mimeType = lookup(path);
  if (!mimeType) {
    throw new AssetError(
      `Can't determine mimetype for ${path}`,
      "unsupported-type",
    );
  }
  return mimeType;
}

/**
 * Read a local file into a data URI (synchronous, for template helpers)
 */
export function fileToDataUri(path: string): string {
  const mimeType = mimeTypeFor(path);
  return toDataUri(readFileSync(path), mimeType);
}
