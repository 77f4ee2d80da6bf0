/**
 * Converter - Pipeline orchestrator
 * Coordinates the build pipeline with zero business logic
 */

import * as modules from "./modules";
import { Tracker, Logger } from "./utils";
import type { BuildContext, SiteBuildConfig } from "./types";

export interface BuildOptions {
  tracker?: Tracker;
  logger?: Logger;
  verbose?: boolean;
  // Called before each stage, e.g. to update a spinner
  onStage?: (stage: string) => void;
}

/**
 * Run the build pipeline: scan → render → copy → index/feed
 * Returns the context so callers can report on it
 */
export async function buildSite(
  config: SiteBuildConfig,
  options: BuildOptions = {},
): Promise<BuildContext> {
  const ctx: BuildContext = {
    config,
    tracker: options.tracker ?? new Tracker(),
    logger: options.logger ?? new Logger(config.logging.level),
    verbose: options.verbose,
  };
  const stage = options.onStage ?? (() => {});

  stage("Scanning files...");
  await modules.scan(ctx);

  stage("Rendering articles...");
  await modules.process(ctx);

  stage("Copying files...");
  await modules.copy(ctx);

  stage("Generating index and feed...");
  await modules.indexer(ctx);

  return ctx;
}

