/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type { BuildContext, ProcessingStats, Tracker } from "../types";

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
 * Display build statistics to console
 */
export function stats(ctx: BuildContext, verbose?: boolean): void {
  const { tracker } = ctx;
  const current = tracker.getStats();
  const hasErrors = current.failedFiles > 0;
  const hasWarnings =
    current.skippedFiles > 0 || tracker.getIssues("resource").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  const duration = chalk.dim(formatDuration(current.duration));
  console.log(
    `  ${statusIcon} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${duration}`,
  );

  displayPagesSection(current);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(current: ProcessingStats): void {
  console.log(sectionHeader("Pages"));

  const bar = progressBar(current.successfulFiles, current.totalFiles);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Rendered", current.successfulFiles, chalk.green),
  );

  if (current.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", current.failedFiles, chalk.red),
    );
  }

  if (current.skippedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", current.skippedFiles, chalk.yellow),
    );
  }

  if (current.createdIndexes > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Index", current.createdIndexes, chalk.cyan),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const resourceIssues = tracker.getIssues("resource");

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Documents", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        const reason = chalk.dim(`(${issue.reason})`);
        console.log(`      ${chalk.dim("·")} ${issue.path} ${reason}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config files",
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
}
