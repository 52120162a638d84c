/**
 * Logger Utility
 * Handles stderr output with different log levels
 */

import chalk from "chalk";

export type LogLevel = "quiet" | "normal" | "verbose" | "debug";

const LEVELS: Record<LogLevel, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
  debug: 3,
};

export interface LogStream {
  write(chunk: string): unknown;
}

export class Logger {
  constructor(
    private level: LogLevel = "normal",
    private stream: LogStream = process.stderr,
  ) {}

  isEnabled(level: LogLevel): boolean {
    return LEVELS[this.level] >= LEVELS[level];
  }

  error(message: string, error?: unknown): void {
    this.write(chalk.red("[ERROR]"), message);
    if (this.isEnabled("debug") && error instanceof Error && error.stack) {
      this.stream.write(`${chalk.dim(error.stack)}\n`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("normal")) {
      this.write(chalk.yellow("[WARN]"), message);
    }
  }

  info(message: string): void {
    if (this.isEnabled("normal")) {
      this.write(chalk.cyan("[INFO]"), message);
    }
  }

  success(message: string): void {
    if (this.isEnabled("normal")) {
      this.write(chalk.green("[SUCCESS]"), message);
    }
  }

  verbose(message: string): void {
    if (this.isEnabled("verbose")) {
      this.write(chalk.white("[VERBOSE]"), message);
    }
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      this.write(chalk.magenta("[DEBUG]"), message);
    }
  }

  /**
   * Unprefixed line, suppressed in quiet mode
   */
  plain(message: string): void {
    if (this.isEnabled("normal")) {
      this.stream.write(`${message}\n`);
    }
  }

  private write(tag: string, message: string): void {
    this.stream.write(`${tag} ${message}\n`);
  }
}
