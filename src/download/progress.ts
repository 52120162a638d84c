/**
 * Download Progress Reporting
 * Observational side channel for the fetcher; never affects results
 */

import chalk from "chalk";
import type { Ora } from "ora";
import type { Logger } from "../utils/logger";

export interface ProgressReporter {
  start(total: number): void;
  update(completed: number, url: string, ok: boolean, error?: Error): void;
  finish(): void;
}

export class NoopReporter implements ProgressReporter {
  start(): void {}
  update(): void {}
  finish(): void {}
}

interface ConsoleReporterOptions {
  logger: Logger;
  verbose: boolean;
  spinner?: Ora;
}

/**
 * Line-per-URL output in verbose mode, spinner text otherwise
 */
export class ConsoleReporter implements ProgressReporter {
  private total = 0;
  private startTime = 0;

  constructor(private options: ConsoleReporterOptions) {}

  start(total: number): void {
    this.total = total;
    this.startTime = Date.now();

    if (this.options.verbose) {
      this.options.logger.plain(`Starting download of ${total} images...`);
    } else if (this.options.spinner) {
      this.options.spinner.text = `Downloading images 0/${total}`;
    }
  }

  update(completed: number, url: string, ok: boolean, error?: Error): void {
    const counter = `[${completed}/${this.total}]`;

    if (this.options.verbose) {
      const line = ok
        ? `${chalk.green("✓")} ${counter} Downloaded: ${url}`
        : `${chalk.red("✗")} ${counter} Failed: ${url} - ${error?.message ?? "unknown error"}`;
      this.options.logger.plain(line);
    } else if (this.options.spinner) {
      this.options.spinner.text = `Downloading images ${completed}/${this.total}`;
    }
  }

  finish(): void {
    if (this.options.verbose) {
      const duration = Date.now() - this.startTime;
      this.options.logger.plain(`Download completed in ${duration}ms`);
    }
  }
}
