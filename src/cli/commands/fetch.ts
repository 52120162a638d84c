/**
 * Fetch command - Loads config and runs the extraction pipeline
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import { ClaudeExecutor } from "../../claude/executor";
import { ConsoleReporter } from "../../download/progress";
import { GitHubClient } from "../../github/client";
import * as modules from "../../modules";
import {
  errorMessage,
  getExitCode,
  isAppError,
  loadConfig,
  Logger,
  Tracker,
  validationError,
} from "../../utils";
import type { LogLevel, LogStream } from "../../utils/logger";
import type { AppConfig, PipelineContext } from "../../types";

const FetchOptionsSchema = z.object({
  out: z.string().min(1).optional(),
  send: z.string().optional(),
  continue: z.boolean().optional(),
  maxSize: z.coerce.number().positive().optional(),
  timeout: z.coerce.number().positive().optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  retries: z.coerce.number().int().nonnegative().optional(),
  force: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type FetchOptions = z.infer<typeof FetchOptionsSchema>;

const STAGE_TEXT: Record<modules.Stage, string> = {
  collect: "Fetching GitHub data...",
  extract: "Extracting image URLs...",
  download: "Downloading images...",
  store: "Storing images...",
  analyze: "Sending to Claude...",
};

export function parseFetchOptions(opts: unknown): FetchOptions {
  const result = FetchOptionsSchema.safeParse(opts);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw validationError(`invalid options: ${details}`, "Run with --help to see valid values");
  }
  return result.data;
}

/**
 * Command-line flags win over every config layer
 */
export function applyOverrides(config: AppConfig, options: FetchOptions): AppConfig {
  return {
    ...config,
    download: {
      ...config.download,
      maxSize: options.maxSize ?? config.download.maxSize,
      timeout: options.timeout ?? config.download.timeout,
      concurrency: options.concurrency ?? config.download.concurrency,
      retries: options.retries ?? config.download.retries,
    },
    output: { ...config.output, force: options.force ?? config.output.force },
  };
}

export function resolveLogLevel(options: FetchOptions, config: AppConfig): LogLevel {
  if (options.quiet) return "quiet";
  if (options.debug) return "debug";
  if (options.verbose) return "verbose";
  return config.logging.level;
}

/**
 * Log stream that keeps the spinner line intact around each write
 */
function spinnerStream(spinner: Ora): LogStream {
  return {
    write(chunk: string) {
      const spinning = spinner.isSpinning;
      if (spinning) spinner.clear();
      const written = process.stderr.write(chunk);
      if (spinning) spinner.render();
      return written;
    },
  };
}

export async function fetchCommand(target: string, opts: unknown): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2, stream: process.stderr });
  let logger = new Logger("normal");

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    // Validate CLI options
    const options = parseFetchOptions(opts);

    // Load configuration (default → user → custom), then CLI flags
    const loaded = await loadConfig(options.config);
    const config = applyOverrides(loaded.config, options);

    const level = resolveLogLevel(options, config);
    if (level === "normal") spinner.start();
    logger = new Logger(level, spinnerStream(spinner));

    // Add any config loading errors to tracker
    const tracker = new Tracker();
    for (const err of loaded.errors) {
      tracker.trackError(err.path, err.error, "resource");
      logger.warn(`Ignoring config ${err.path}: ${errorMessage(err.error)}`);
    }

    const github = new GitHubClient({
      maxRetries: config.github.retries,
      baseDelay: config.github.baseDelay,
      maxDelay: config.github.maxDelay,
    });
    const claude = new ClaudeExecutor();

    logger.debug("Checking prerequisites...");
    await github.checkAvailable();

    const ctx: PipelineContext = {
      config,
      options: {
        target,
        out: options.out,
        send: options.send,
        continueSession: options.continue ?? false,
      },
      services: {
        source: github,
        sink: claude,
        reporter: new ConsoleReporter({
          logger,
          verbose: logger.isEnabled("verbose"),
          spinner: level === "normal" ? spinner : undefined,
        }),
        stdout: process.stdout,
        cwd: process.cwd(),
        signal: controller.signal,
      },
      logger,
      tracker,
    };

    logger.info(`Processing target: ${target}`);
    await modules.run(ctx, (stage) => {
      if (stage === "analyze" && options.send !== undefined) {
        // claude takes over the terminal
        spinner.stop();
      }
      spinner.text = STAGE_TEXT[stage];
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    if (spinner.isSpinning) spinner.fail("Extraction failed");
    logger.error(
      isAppError(error) ? error.format() : `Error: ${errorMessage(error)}`,
      error,
    );
    process.off("SIGINT", onInterrupt);
    process.exit(getExitCode(error));
  }
  process.off("SIGINT", onInterrupt);
}
