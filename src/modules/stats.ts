/**
 * Stats Module
 * Displays fetch statistics and issues
 */

import chalk from "chalk";
import type { Tracker, FetchStats, FetchContext } from "../types";

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
 * Display fetch statistics to console.
 * fetch-stats.json is written by the fetch command, also for failed runs.
 */
export async function stats(ctx: FetchContext, verbose = false): Promise<void> {
  const { request, tracker } = ctx;

  const summary = tracker.getStats();
  const hasWarnings = summary.wipedFiles > 0 || summary.issues.length > 0;
  const hasErrors = summary.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = request.dryRun ? "Dry Run Complete" : "Fetch Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayFilesSection(summary);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(summary: FetchStats): void {
  console.log(sectionHeader("Files"));

  const present = summary.existingFiles + summary.downloadedFiles;
  console.log(`   ${progressBar(present, summary.plannedFiles)}`);

  console.log(
    statRow(chalk.white("◉"), "Planned", summary.plannedFiles),
  );

  if (summary.downloadedFiles > 0) {
    console.log(
      statRow(
        chalk.green("◉"),
        "Downloaded",
        summary.downloadedFiles,
        chalk.green,
      ),
    );
  }

  if (summary.existingFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Already present", summary.existingFiles, chalk.cyan),
    );
  }

  if (summary.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", summary.failedFiles, chalk.red),
    );
  }

  if (summary.wipedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Wiped", summary.wipedFiles, chalk.yellow),
    );
  }

  if (summary.batches > 0) {
    console.log(statRow(chalk.dim("◉"), "Batches", summary.batches));
  }
}

function displayIssuesSection(tracker: Tracker, verbose: boolean): void {
  const issues = tracker.getIssues();
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  for (const type of ["download", "validation", "resource"] as const) {
    const ofType = tracker.getIssues(type);
    if (ofType.length === 0) continue;

    console.log(
      statRow(chalk.yellow("✖"), `${type} issues`, ofType.length, chalk.yellow),
    );

    if (!verbose) continue;

    for (const issue of ofType.slice(0, 10)) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (ofType.length > 10) {
      console.log(`      ${chalk.dim(`  +${ofType.length - 10} more`)}`);
    }
  }
}
