/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type {
  BuildContext,
  BuildResult,
  Issue,
  ProcessingStats,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

function formatDuration(ms: number): string {
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

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const kb = bytes / 1024;
  if (kb < 1024) {
    return `${kb.toFixed(0)} KB`;
  }
  return `${(kb / 1024).toFixed(1)} MB`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
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

function describeIssue(issue: Issue): string {
  switch (issue.type) {
    case "reference":
      return issue.name ? `${issue.path} (${issue.name})` : issue.path;
    case "file":
    case "resource":
    case "fallback":
      return issue.details ? `${issue.path}: ${issue.details}` : issue.path;
  }
}

// ============================================================================
// Main Stats Display
// ============================================================================

export type PrintLine = (line: string) => void;

/**
 * Display build statistics
 */
export async function stats(
  ctx: BuildContext,
  print: PrintLine = (line) => console.log(line),
): Promise<void> {
  const { tracker, verbose, result } = ctx;
  const summary = tracker.getStats();

  const failed = summary.failedFiles > 0;
  const warned = summary.skippedReferences > 0 || summary.issues.length > 0;
  const statusIcon = failed ? chalk.red("✖") : warned ? chalk.yellow("◆") : chalk.green("✔");

  print("");
  print(
    `  ${statusIcon} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  if (result) {
    displayOutputSection(result, print);
  }
  displayChaptersSection(summary, print);
  displayIssuesSection(summary.issues, verbose, print);

  print("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayOutputSection(result: BuildResult, print: PrintLine): void {
  print(sectionHeader("Book"));
  print(statRow(chalk.cyan("◉"), "File", result.outputPath, chalk.cyan));
  print(statRow(chalk.cyan("◉"), "Size", formatSize(result.size), chalk.cyan));
  print(statRow(chalk.cyan("◉"), "Identifier", result.identifier));
}

function displayChaptersSection(summary: ProcessingStats, print: PrintLine): void {
  print(sectionHeader("Chapters"));
  print(`   ${progressBar(summary.successfulFiles, summary.totalFiles)}`);

  print(statRow(chalk.green("◉"), "Assembled", summary.successfulFiles, chalk.green));
  print(statRow(chalk.green("◉"), "Parts", summary.parts, chalk.green));

  if (summary.failedFiles > 0) {
    print(statRow(chalk.red("◉"), "Failed", summary.failedFiles, chalk.red));
  }

  if (summary.duplicateFiles > 0) {
    print(statRow(chalk.dim("◉"), "Already placed", summary.duplicateFiles, chalk.dim));
  }

  if (summary.skippedReferences > 0) {
    print(
      statRow(chalk.yellow("◉"), "Skipped links", summary.skippedReferences, chalk.yellow),
    );
  }
}

function displayIssuesSection(issues: Issue[], verbose: boolean, print: PrintLine): void {
  if (issues.length === 0) {
    return;
  }

  print(sectionHeader(chalk.yellow("Issues")));

  const groups: [Issue["type"], string][] = [
    ["file", "Files"],
    ["reference", "Unresolved links"],
    ["resource", "Resources"],
    ["fallback", "Fallbacks"],
  ];

  for (const [type, label] of groups) {
    const matching = issues.filter((issue) => issue.type === type);
    if (matching.length === 0) continue;

    const color = type === "file" ? chalk.red : chalk.yellow;
    print(statRow(color("✖"), label, matching.length, color));

    if (verbose) {
      for (const issue of matching) {
        print(`      ${chalk.dim("·")} ${describeIssue(issue)}`);
      }
    }
  }
}
