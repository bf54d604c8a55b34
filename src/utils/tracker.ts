/**
 * Build Tracker
 * Unified tracking for stats and recoverable issues
 */

import { ZodError } from "zod";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "read-error"
  | "metadata-error"
  | "parse-error"
  | "write-error"
  | "missing-title";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export type FileErrorContext = "read" | "metadata" | "parse" | "write";

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedFiles: number;

  // Other counts
  createdIndexes: number;

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

const FILE_REASONS: Record<FileErrorContext, FileIssueReason> = {
  read: "read-error",
  metadata: "metadata-error",
  parse: "parse-error",
  write: "write-error",
};

function mapFileError(
  error: unknown,
  context: FileErrorContext,
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  // A vanished source is a read problem whatever stage noticed it
  if (
    context !== "write" &&
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  ) {
    return { reason: "read-error", details };
  }

  return { reason: FILE_REASONS[context], details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private createdIndexes = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  incrementCreatedIndexes(): void {
    this.createdIndexes++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context: FileErrorContext = "read",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  /**
   * Track a document left out without an underlying error
   */
  trackSkipped(path: string, details: string): void {
    this.issues.push({ type: "file", path, reason: "missing-title", details });
    this.incrementSkipped();
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues(type: "file"): FileIssue[];
  getIssues(type: "resource"): ResourceIssue[];
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
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      createdIndexes: this.createdIndexes,
      issues: [...this.issues],
      duration,
    };
  }
}
