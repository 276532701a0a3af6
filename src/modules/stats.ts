/**
 * Stats Module
 * Displays processing statistics and every issue that needs a manual fix
 */

import chalk from "chalk";
import path from "node:path";
import type { ConversionContext, ProcessingStats } from "../types";
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

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON next to the assets and display them
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { config, tracker, verbose } = ctx;
  const statsPath = path.resolve(config.output.assets, "stats.json");
  try {
    await tracker.exportStats(statsPath);
  } catch (error) {
    tracker.trackError(statsPath, error, "file", "write");
  }

  const stats = tracker.getStats();
  const hasWarnings = tracker.getIssues("match").length > 0;
  const hasErrors = stats.failedArticles > 0 || tracker.getIssues("file").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Issue Prepared")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayArticlesSection(stats);
  displayAssetsSection(stats);
  displayUnconvertedSection(tracker);
  displayErrorsSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayArticlesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Articles"));
  console.log(`   ${progressBar(stats.processedArticles, stats.totalArticles)}`);
  console.log(statRow(chalk.green("◉"), "Processed", stats.processedArticles, chalk.green));

  if (stats.failedArticles > 0) {
    console.log(statRow(chalk.red("◉"), "Dropped", stats.failedArticles, chalk.red));
  }
}

function displayAssetsSection(stats: ProcessingStats): void {
  if (stats.storedImages === 0 && stats.compiledFormulas === 0) {
    return;
  }

  console.log(sectionHeader("Assets"));
  if (stats.storedImages > 0) {
    console.log(statRow(chalk.cyan("◉"), "Images", stats.storedImages, chalk.cyan));
  }
  if (stats.compiledFormulas > 0) {
    console.log(statRow(chalk.cyan("◉"), "Formulas", stats.compiledFormulas, chalk.cyan));
  }
}

/**
 * Every unconverted match is listed, so it can be fixed in the source
 */
function displayUnconvertedSection(tracker: Tracker): void {
  const matchIssues = tracker.getIssues("match");
  if (matchIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Unconverted")));
  for (const issue of matchIssues) {
    console.log(
      `      ${chalk.dim("·")} ${chalk.yellow(issue.match)} ${chalk.dim(`in ${issue.article} "${issue.title}" (${issue.pass}, ${issue.reason})`)}`,
    );
    console.log(`        ${chalk.dim(issue.details)}`);
  }
}

function displayErrorsSection(tracker: Tracker, verbose?: boolean): void {
  const articleIssues = tracker.getIssues("article");
  const fileIssues = tracker.getIssues("file");
  const resourceIssues = tracker.getIssues("resource");

  if (articleIssues.length + fileIssues.length + resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (articleIssues.length > 0) {
    console.log(statRow(chalk.red("✖"), "Articles dropped", articleIssues.length, chalk.red));
    for (const issue of articleIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.article} "${issue.title}" ${chalk.dim(`(${issue.pass}, ${issue.reason})`)}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (fileIssues.length > 0) {
    console.log(statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red));
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(statRow(chalk.yellow("✖"), "Config failed", resourceIssues.length, chalk.yellow));
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
