/**
 * Fetch Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { HttpError } from "./errors";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type DownloadIssueReason =
  | "timeout"
  | "invalid-response"
  | "write-error"
  | "download-failed";
export type ValidationIssueReason = "invalid-image" | "missing-file";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "index-unavailable"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface DownloadIssue {
  type: "download";
  path: string;
  reason: DownloadIssueReason;
  details?: string;
}

export interface ValidationIssue {
  type: "validation";
  path: string;
  reason: ValidationIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = DownloadIssue | ValidationIssue | ResourceIssue;

export interface BatchResult {
  index: number; // 1-based
  files: number;
  downloaded: number;
  failed: number;
}
export type IssueType = Issue["type"];

export interface FetchStats {
  // File counts
  plannedFiles: number;
  downloadedFiles: number;
  existingFiles: number;
  failedFiles: number;
  wipedFiles: number;

  // Batch counts
  batches: number;
  batchResults: BatchResult[];

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
  if (error instanceof HttpError) {
    return {
      reason: "index-unavailable",
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

function mapDownloadError(error: unknown): IssueInfo<DownloadIssueReason> {
  if (error instanceof HttpError) {
    return {
      reason: "invalid-response",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    // Timeout from AbortController
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return {
        reason: "timeout",
        details: error.message,
      };
    }
    if ("code" in error && (error.code === "EACCES" || error.code === "ENOSPC")) {
      return {
        reason: "write-error",
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

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private plannedFiles = 0;
  private downloadedFiles = 0;
  private existingFiles = 0;
  private failedFiles = 0;
  private wipedFiles = 0;
  private batchResults: BatchResult[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setPlannedFiles(count: number): void {
    this.plannedFiles = count;
  }

  incrementDownloaded(): void {
    this.downloadedFiles++;
  }

  incrementExisting(): void {
    this.existingFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  trackBatch(result: BatchResult): void {
    this.batchResults.push(result);
  }

  trackWiped(path: string): void {
    this.wipedFiles++;
    this.issues.push({
      type: "validation",
      path,
      reason: "invalid-image",
      details: "Invalid image removed before fetching",
    });
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: "download" | "resource",
  ): void {
    switch (type) {
      case "download": {
        const { reason, details } = mapDownloadError(error);
        this.issues.push({ type: "download", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackValidation(
    path: string,
    reason: ValidationIssueReason,
    details?: string,
  ): void {
    this.issues.push({ type: "validation", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): FetchStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      plannedFiles: this.plannedFiles,
      downloadedFiles: this.downloadedFiles,
      existingFiles: this.existingFiles,
      failedFiles: this.failedFiles,
      wipedFiles: this.wipedFiles,
      batches: this.batchResults.length,
      batchResults: this.batchResults,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const { issues, batchResults, ...summary } = this.getStats();

    const exported = {
      summary,
      batches: batchResults,
      issues: this.groupIssuesByTypeAndReason(issues),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "fetch-stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(
    issues: Issue[],
  ): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      download: {},
      validation: {},
      resource: {},
    };

    for (const issue of issues) {
      const byReason = grouped[issue.type];
      if (!byReason[issue.reason]) {
        byReason[issue.reason] = [];
      }
      byReason[issue.reason].push(issue);
    }

    return grouped;
  }
}
