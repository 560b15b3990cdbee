/**
 * Stats Module
 * Displays the run summary: files, rows and issues
 */

import chalk from "chalk";
import type { ProcessingStats } from "../types";
import type { Tracker } from "../utils/tracker";

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

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
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

export interface StatsOptions {
  verbose?: boolean;
  outputFile?: string;
}

/**
 * Display processing statistics to console
 */
export function stats(tracker: Tracker, options: StatsOptions = {}): void {
  const summary = tracker.getStats();
  const hasErrors = summary.convertedRows === 0 || summary.failedFiles > 0;
  const hasWarnings = summary.skippedRows > 0 || summary.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayFilesSection(summary);
  displayRowsSection(summary);
  displayIssuesSection(tracker, options.verbose);

  if (options.outputFile) {
    console.log(sectionHeader("Output"));
    console.log(`   ${chalk.cyan(options.outputFile)}`);
  }

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(summary: ProcessingStats): void {
  console.log(sectionHeader("Files"));
  console.log(statRow(chalk.green("◉"), "Processed", summary.processedFiles, chalk.green));

  if (summary.emptyFiles > 0) {
    console.log(statRow(chalk.yellow("◉"), "Empty", summary.emptyFiles, chalk.yellow));
  }

  if (summary.failedFiles > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failedFiles, chalk.red));
  }

  if (summary.lutRecords > 0) {
    console.log(statRow(chalk.cyan("◉"), "LUT records", summary.lutRecords, chalk.cyan));
  }
}

function displayRowsSection(summary: ProcessingStats): void {
  const total = summary.convertedRows + summary.skippedRows;

  console.log(sectionHeader("Questionnaires"));
  console.log(`   ${progressBar(summary.convertedRows, total)}`);
  console.log(statRow(chalk.green("◉"), "Converted", summary.convertedRows, chalk.green));

  if (summary.skippedRows > 0) {
    console.log(statRow(chalk.yellow("◉"), "Skipped", summary.skippedRows, chalk.yellow));
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const rowIssues = tracker.getIssues("row");
  const validationIssues = tracker.getIssues("validation");
  const lookupIssues = tracker.getIssues("lookup-miss");
  const fileIssues = tracker.getIssues("file");

  const hasIssues =
    rowIssues.length > 0 ||
    validationIssues.length > 0 ||
    lookupIssues.length > 0 ||
    fileIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(statRow(chalk.red("✖"), "Files", fileIssues.length, chalk.red));
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (rowIssues.length > 0) {
    console.log(statRow(chalk.yellow("✖"), "Rows skipped", rowIssues.length, chalk.yellow));
    if (verbose) {
      for (const issue of rowIssues) {
        const details = issue.details ?? issue.reason;
        console.log(`      ${chalk.dim("·")} ${issue.path}:${issue.row} ${chalk.dim(details)}`);
      }
    }
  }

  if (validationIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Fields rejected", validationIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of validationIssues.slice(0, 10)) {
        console.log(
          `      ${chalk.dim("·")} ${issue.path}:${issue.row} ${issue.field}='${issue.value}' ${chalk.dim(issue.pattern)}`,
        );
      }
      if (validationIssues.length > 10) {
        console.log(`      ${chalk.dim(`  +${validationIssues.length - 10} more`)}`);
      }
    }
  }

  if (lookupIssues.length > 0) {
    console.log(statRow(chalk.yellow("✖"), "LUT misses", lookupIssues.length, chalk.yellow));
    if (verbose) {
      for (const issue of lookupIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}:${issue.row} ${issue.key}`);
      }
    }
  }
}
