/**
 * Copier Module
 * Passes non-markdown files through to the output unchanged
 */

import { copyFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import type { AssetFile, BuildContext } from "../types";

export async function copy(ctx: BuildContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before copier");
  }

  const { tracker, logger } = ctx;
  const assets = ctx.files.filter(
    (file): file is AssetFile => file.kind === "asset",
  );

  for (const file of assets) {
    try {
      await mkdir(dirname(file.outputPath), { recursive: true });
      await copyFile(file.sourcePath, file.outputPath);
      tracker.incrementCopied();
      logger.debug(`Copied ${file.relativePath}`);
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", "write");
      tracker.incrementFailed();
    }
  }
}
