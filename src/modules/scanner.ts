/**
 * Scanner Module
 * Discovers source files, classifies them as markdown or assets, and finds
 * template overrides
 */

import glob from "fast-glob";
import path from "node:path";
import { OutputConflictError, pathKind, toHref } from "../utils";
import type {
  BuildContext,
  SiteBuildConfig,
  SourceFile,
  TemplateSet,
} from "../types";

/**
 * Detect template files in a directory
 * Returns paths to template files if they exist
 */
async function detectTemplates(directory: string): Promise<TemplateSet> {
  const find = async (name: string): Promise<string | null> => {
    const templatePath = path.join(directory, name);
    return (await pathKind(templatePath)) === "file" ? templatePath : null;
  };

  return {
    directory,
    page: await find("page.html.hbs"),
    embed: await find("embed.html.hbs"),
    index: await find("index.html.hbs"),
    feed: await find("feed.xml.hbs"),
  };
}

/**
 * Glob patterns to skip: editor backups, templates, and the output
 * directory when it lives inside the input
 */
function ignorePatterns(inputDir: string, outputDir: string): string[] {
  const ignore = ["**/*~", "**/*.hbs"];

  const relativeOutput = path.relative(inputDir, outputDir);
  if (
    relativeOutput &&
    !relativeOutput.startsWith("..") &&
    !path.isAbsolute(relativeOutput)
  ) {
    ignore.push(`${glob.escapePath(relativeOutput.split(path.sep).join("/"))}/**`);
  }

  return ignore;
}

/**
 * Build the descriptor for one scanned entry (a path relative to the input)
 */
export function describeFile(
  entry: string,
  config: SiteBuildConfig,
): SourceFile {
  const inputDir = path.resolve(config.input);
  const outputDir = path.resolve(config.output);
  const relativePath = path.normalize(entry);
  const sourcePath = path.join(inputDir, relativePath);

  const extension = path.extname(relativePath).toLowerCase();
  if (!config.files.markdownExtensions.includes(extension)) {
    return {
      kind: "asset",
      sourcePath,
      relativePath,
      outputPath: path.join(outputDir, relativePath),
    };
  }

  const directory = path.dirname(relativePath);
  const stem = path.basename(relativePath, path.extname(relativePath));
  const pageName = path.join(directory, `${stem}.html`);
  const embedName = path.join(directory, `${stem}${config.embed.suffix}.html`);

  return {
    kind: "markdown",
    sourcePath,
    relativePath,
    stem,
    outputPath: path.join(outputDir, pageName),
    href: toHref(pageName),
    embedPath: path.join(outputDir, embedName),
    embedHref: toHref(embedName),
  };
}

function outputsOf(file: SourceFile, config: SiteBuildConfig): string[] {
  if (file.kind === "asset") return [file.outputPath];
  return config.embed.enabled
    ? [file.outputPath, file.embedPath]
    : [file.outputPath];
}

/**
 * Give every output path a single owner
 * Generated files come first, then markdown files, then assets (each in scan
 * order); a file whose output is already taken is dropped and tracked
 */
function claimOutputs(files: SourceFile[], ctx: BuildContext): SourceFile[] {
  const { config, tracker, logger } = ctx;
  const outputDir = path.resolve(config.output);
  const owners = new Map<string, string>();

  owners.set(path.join(outputDir, config.index.filename), "the index page");
  if (config.feed.enabled) {
    owners.set(path.join(outputDir, config.feed.filename), "the feed");
  }
  owners.set(path.join(outputDir, "stats.json"), "the build stats");

  const rejected = new Set<SourceFile>();
  const claimants = [
    ...files.filter((file) => file.kind === "markdown"),
    ...files.filter((file) => file.kind === "asset"),
  ];

  for (const file of claimants) {
    const outputs = outputsOf(file, config);
    const taken = outputs.find((output) => owners.has(output));

    if (taken !== undefined) {
      const error = new OutputConflictError(
        path.relative(outputDir, taken),
        owners.get(taken) ?? "another file",
      );
      logger.warn(`Skipping ${file.relativePath}: ${error.message}`);
      tracker.trackError(file.relativePath, error, "file");
      tracker.incrementFailed();
      rejected.add(file);
      continue;
    }

    for (const output of outputs) {
      owners.set(output, file.relativePath);
    }
  }

  return files.filter((file) => !rejected.has(file));
}

/**
 * Scans input directory and populates context
 *
 * Writes to context:
 * - files: All files (flat list, in configured order)
 * - templates: Template overrides (or nulls for built-in defaults)
 */
export async function scan(ctx: BuildContext): Promise<void> {
  const { config, logger } = ctx;
  const inputDir = path.resolve(config.input);
  const outputDir = path.resolve(config.output);

  if ((await pathKind(inputDir)) !== "directory") {
    throw new Error(`Input directory not found: ${inputDir}`);
  }

  if ((await pathKind(outputDir)) !== null) {
    logger.warn(`Output path already exists: ${outputDir}`);
  }

  // 1. Detect templates (configured directory, else input root)
  const templateDir = config.templates
    ? path.resolve(config.templates)
    : inputDir;
  const templates = await detectTemplates(templateDir);

  // 2. Discover files using fast-glob (dot: false skips hidden files and directories)
  const entries = await glob("**/*", {
    cwd: inputDir,
    onlyFiles: true,
    dot: false,
    ignore: ignorePatterns(inputDir, outputDir),
  });

  // 3. Sort by relative path; descending lists date-prefixed articles newest first
  entries.sort();
  if (config.files.sort === "desc") {
    entries.reverse();
  }

  const described = entries.map((entry) => describeFile(entry, config));
  ctx.tracker.setTotalFiles(described.length);

  // 4. Drop files whose outputs collide
  const files = claimOutputs(described, ctx);

  logger.debug(
    `Found ${files.filter((f) => f.kind === "markdown").length} markdown files and ${files.filter((f) => f.kind === "asset").length} assets`,
  );

  ctx.files = files;
  ctx.templates = templates;
}
