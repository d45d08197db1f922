/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  FileIssueReason,
  ResourceIssueReason,
  FallbackIssueReason,
  ProcessingStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: describe(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "render" = "read",
): IssueInfo<FileIssueReason> {
  const details = describe(error);

  if (error instanceof Error && "code" in error) {
    if (
      error.code === "ENOENT" ||
      error.code === "EACCES" ||
      error.code === "EPERM" ||
      error.code === "EISDIR"
    ) {
      return { reason: "read-error", details };
    }
  }

  return { reason: `${context}-error`, details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedReferences = 0;
  private duplicateFiles = 0;
  private parts = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementTotal(count = 1): void {
    this.totalFiles += count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementDuplicates(count = 1): void {
    this.duplicateFiles += count;
  }

  setParts(count: number): void {
    this.parts = count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackUnresolvedReference(path: string, name?: string): void {
    this.skippedReferences++;
    this.issues.push({ type: "reference", path, reason: "not-found", name });
  }

  trackMalformedFrontmatter(path: string, details: string): void {
    this.issues.push({
      type: "file",
      path,
      reason: "malformed-frontmatter",
      details,
    });
  }

  trackFallback(path: string, reason: FallbackIssueReason, error?: unknown): void {
    this.issues.push({
      type: "fallback",
      path,
      reason,
      details: error === undefined ? undefined : describe(error),
    });
  }

  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context?: "read" | "render",
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

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedReferences: this.skippedReferences,
      duplicateFiles: this.duplicateFiles,
      parts: this.parts,
      issues: this.issues,
      duration,
    };
  }
}
