/**
 * Stats Module
 * Displays run statistics and issues on the log stream
 */

import chalk from "chalk";
import type { Logger } from "../utils/logger";
import type { PipelineContext, ProcessingStats, Tracker } from "../types";

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

/**
 * @example
 * formatBytes(512) // "512 B"
 * formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const kb = bytes / 1024;
  if (kb < 1024) return `${kb.toFixed(1)} KB`;
  return `${(kb / 1024).toFixed(1)} MB`;
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

export async function stats(ctx: PipelineContext): Promise<void> {
  const { tracker, logger } = ctx;
  const stats = tracker.getStats();
  const hasErrors = stats.downloadedImages === 0 && stats.urlsFound > 0;
  const hasWarnings = stats.failedImages > 0 || stats.failedStores > 0;

  logger.plain("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  logger.plain(
    `  ${statusIcon} ${chalk.bold("Extraction Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displaySourcesSection(logger, stats);
  displayImagesSection(logger, stats);
  displayStorageSection(logger, stats, ctx);
  displayIssuesSection(logger, tracker);

  logger.plain("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displaySourcesSection(logger: Logger, stats: ProcessingStats): void {
  logger.plain(sectionHeader("Sources"));
  logger.plain(statRow(chalk.cyan("◉"), "Documents", stats.documents, chalk.cyan));
  logger.plain(statRow(chalk.cyan("◉"), "Image URLs", stats.urlsFound, chalk.cyan));
}

function displayImagesSection(logger: Logger, stats: ProcessingStats): void {
  if (stats.urlsFound === 0) return;

  logger.plain(sectionHeader("Images"));
  logger.plain(`   ${progressBar(stats.downloadedImages, stats.urlsFound)}`);

  if (stats.downloadedImages > 0) {
    logger.plain(
      statRow(chalk.green("◉"), "Downloaded", stats.downloadedImages, chalk.green),
    );
    logger.plain(statRow(chalk.green("◉"), "Size", formatBytes(stats.downloadedBytes)));
  }

  if (stats.failedImages > 0) {
    logger.plain(statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red));
  }
}

function displayStorageSection(
  logger: Logger,
  stats: ProcessingStats,
  ctx: PipelineContext,
): void {
  if (!ctx.storage) return;

  logger.plain(sectionHeader("Storage"));
  const where = ctx.storage.mode === "disk" ? ctx.storage.storage.getOutputDir() : "memory";
  logger.plain(statRow(chalk.cyan("◉"), "Destination", where, chalk.cyan));
  logger.plain(statRow(chalk.green("◉"), "Stored", stats.storedImages, chalk.green));

  if (stats.failedStores > 0) {
    logger.plain(statRow(chalk.yellow("◉"), "Failed", stats.failedStores, chalk.yellow));
  }
}

function displayIssuesSection(logger: Logger, tracker: Tracker): void {
  const imageIssues = tracker.getIssues("image");
  const storageIssues = tracker.getIssues("storage");
  const resourceIssues = tracker.getIssues("resource");
  const verbose = logger.isEnabled("verbose");

  if (imageIssues.length + storageIssues.length + resourceIssues.length === 0) {
    return;
  }

  logger.plain(sectionHeader(chalk.red("Errors")));

  if (imageIssues.length > 0) {
    logger.plain(
      statRow(chalk.yellow("✖"), "Images failed", imageIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of imageIssues.slice(0, 5)) {
        logger.plain(`      ${chalk.dim("·")} ${issue.path}`);
        logger.plain(`        ${chalk.dim(issue.details)}`);
      }
      if (imageIssues.length > 5) {
        logger.plain(`      ${chalk.dim(`  +${imageIssues.length - 5} more`)}`);
      }
    }
  }

  if (storageIssues.length > 0) {
    logger.plain(
      statRow(chalk.red("✖"), "Saves failed", storageIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of storageIssues) {
        logger.plain(`      ${chalk.dim("·")} ${issue.path}`);
        logger.plain(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    logger.plain(
      statRow(chalk.yellow("✖"), "Configs ignored", resourceIssues.length, chalk.yellow),
    );
    for (const issue of resourceIssues) {
      logger.plain(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) logger.plain(`        ${chalk.dim(issue.details)}`);
    }
  }
}
