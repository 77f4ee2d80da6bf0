/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type { Tracker, ProcessingStats, BuildContext } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display build statistics to console
 */
export async function stats(ctx: BuildContext): Promise<void> {
  const { config, tracker, verbose } = ctx;
  await tracker.exportStats(config.output);

  const stats = tracker.getStats();
  const hasWarnings =
    stats.failedImages > 0 ||
    stats.failedStylesheets > 0 ||
    stats.issues.length > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayEmbedSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  const bar = progressBar(
    stats.renderedFiles + stats.copiedFiles,
    stats.totalFiles,
  );
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Rendered", stats.renderedFiles, chalk.green),
  );

  if (stats.copiedFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Copied", stats.copiedFiles, chalk.cyan),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }

  if (stats.embeddedPages > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Embedded pages", stats.embeddedPages, chalk.cyan),
    );
  }

  const generated = [
    stats.createdIndexes > 0 ? "index" : null,
    stats.createdFeeds > 0 ? "feed" : null,
  ].filter((name): name is string => name !== null);

  if (generated.length > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Generated", generated.join(", "), chalk.cyan),
    );
  }
}

function displayEmbedSection(stats: ProcessingStats): void {
  const totalImages = stats.inlinedImages + stats.failedImages;
  if (totalImages === 0 && stats.failedStylesheets === 0) {
    return;
  }

  console.log(sectionHeader("Embedded assets"));

  const bar = progressBar(stats.inlinedImages, totalImages);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Images inlined", stats.inlinedImages, chalk.green),
  );

  if (stats.failedImages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Images failed", stats.failedImages, chalk.red),
    );
  }

  if (stats.failedStylesheets > 0) {
    console.log(
      statRow(
        chalk.red("◉"),
        "Stylesheets failed",
        stats.failedStylesheets,
        chalk.red,
      ),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const assetIssues = tracker.getIssues("asset");
  const resourceIssues = tracker.getIssues("resource");
  const articleIssues = tracker.getIssues("article");

  if (
    fileIssues.length === 0 &&
    assetIssues.length === 0 &&
    resourceIssues.length === 0 &&
    articleIssues.length === 0
  ) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (assetIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Assets failed",
        assetIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of assetIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
      if (assetIssues.length > 5) {
        console.log(`      ${chalk.dim(`  +${assetIssues.length - 5} more`)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (articleIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("◆"),
        "Title warnings",
        articleIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of articleIssues) {
        const details = issue.details ? ` ${chalk.dim(`"${issue.details}"`)}` : "";
        console.log(`      ${chalk.dim("·")} ${issue.path}: ${issue.reason}${details}`);
      }
    }
  }
}
