/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { AssetError, OutputConflictError } from "./errors";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "parse-error"
  | "read-error"
  | "write-error"
  | "output-conflict";
export type AssetIssueReason =
  | "download-failed"
  | "timeout"
  | "not-found"
  | "invalid-response"
  | "unsupported-type"
  | "too-large";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type ArticleIssueReason = "no-title" | "duplicate-title" | "late-title";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface AssetIssue {
  type: "asset";
  path: string;
  reason: AssetIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface ArticleIssue {
  type: "article";
  path: string;
  reason: ArticleIssueReason;
  details?: string;
}

export type Issue = FileIssue | AssetIssue | ResourceIssue | ArticleIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  renderedFiles: number;
  copiedFiles: number;
  failedFiles: number;

  // Embedded asset counts
  inlinedImages: number;
  failedImages: number;
  failedStylesheets: number;

  // Generated outputs
  embeddedPages: number;
  createdIndexes: number;
  createdFeeds: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapAssetError(error: unknown): IssueInfo<AssetIssueReason> {
  if (error instanceof AssetError) {
    return {
      reason: error.reason,
      details: error.message,
    };
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return {
        reason: "timeout",
        details: error.message,
      };
    }
    if (error.message.startsWith("HTTP ")) {
      return {
        reason: "invalid-response",
        details: error.message,
      };
    }
    if ("code" in error && error.code === "ENOENT") {
      return {
        reason: "not-found",
        details: error.message,
      };
    }
    return {
      reason: "download-failed",
      details: error.message,
    };
  }
  return {
    reason: "download-failed",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "parse" | "write" = "parse",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof OutputConflictError) {
    return { reason: "output-conflict", details };
  }

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "read-error", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return {
        reason: context === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  const reasons: Record<typeof context, FileIssueReason> = {
    read: "read-error",
    parse: "parse-error",
    write: "write-error",
  };
  return { reason: reasons[context], details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private renderedFiles = 0;
  private copiedFiles = 0;
  private failedFiles = 0;
  private inlinedImages = 0;
  private failedImages = 0;
  private failedStylesheets = 0;
  private embeddedPages = 0;
  private createdIndexes = 0;
  private createdFeeds = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementRendered(): void {
    this.renderedFiles++;
  }

  incrementCopied(): void {
    this.copiedFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementImagesInlined(count = 1): void {
    this.inlinedImages += count;
  }

  incrementImagesFailed(): void {
    this.failedImages++;
  }

  incrementStylesheetsFailed(): void {
    this.failedStylesheets++;
  }

  incrementEmbeddedPages(): void {
    this.embeddedPages++;
  }

  incrementCreatedIndexes(): void {
    this.createdIndexes++;
  }

  incrementCreatedFeeds(): void {
    this.createdFeeds++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "file" | "asset" | "resource",
    context?: "read" | "parse" | "write",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "asset": {
        const { reason, details } = mapAssetError(error);
        this.issues.push({ type: "asset", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackArticleIssue(
    path: string,
    reason: ArticleIssueReason,
    details?: string,
  ): void {
    this.issues.push({ type: "article", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      renderedFiles: this.renderedFiles,
      copiedFiles: this.copiedFiles,
      failedFiles: this.failedFiles,
      inlinedImages: this.inlinedImages,
      failedImages: this.failedImages,
      failedStylesheets: this.failedStylesheets,
      embeddedPages: this.embeddedPages,
      createdIndexes: this.createdIndexes,
      createdFeeds: this.createdFeeds,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const { issues, ...summary } = this.getStats();

    const exported = {
      summary,
      issues: this.groupIssuesByTypeAndReason(issues),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(
    issues: Issue[],
  ): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      file: {},
      asset: {},
      resource: {},
      article: {},
    };

    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
