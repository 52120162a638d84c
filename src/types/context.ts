/**
 * Pipeline context - flows through the entire run
 * Each module reads what it needs and writes its results back
 */

import type { AppConfig } from "./config";
import type { AnalysisSink } from "../claude/executor";
import type { FetchResult, FetchSuccess } from "../download/fetcher";
import type { ProgressReporter } from "../download/progress";
import type { IssueSource } from "../github/client";
import type { IssueTarget } from "../github/target";
import type { DiskStorage, MemoryStorage } from "../storage";
import type { Logger, LogStream } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  ImageIssue,
  StorageIssue,
  ResourceIssue,
  ImageIssueReason,
  StorageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

/**
 * Per-run choices from the command line
 */
export interface RunOptions {
  target: string;
  /** Output directory; memory mode when absent */
  out?: string;
  /** Prompt for the analysis sink; analysis is skipped when absent */
  send?: string;
  continueSession: boolean;
}

/**
 * Collaborators and process handles, injectable for tests
 */
export interface PipelineServices {
  source: IssueSource;
  sink: AnalysisSink;
  reporter?: ProgressReporter;
  /** Receives the base64 lines in memory mode */
  stdout: LogStream;
  /** Base directory that --out must stay inside */
  cwd: string;
  signal?: AbortSignal;
}

export interface SourceDocument {
  /** "issue" or "comment <id>" */
  label: string;
  body: string;
}

export type StorageState =
  | { mode: "memory"; storage: MemoryStorage }
  | { mode: "disk"; storage: DiskStorage };

export interface PipelineContext {
  // Input - provided at initialization
  config: AppConfig;
  options: RunOptions;
  services: PipelineServices;
  logger: Logger;

  // Unified tracking for stats and issues
  tracker: Tracker;

  target?: IssueTarget;
  documents?: SourceDocument[];
  urls?: string[];
  results?: FetchResult[];
  downloads?: FetchSuccess[];
  storage?: StorageState;
  /** Base64 strings (memory) or file paths (disk), in store order */
  stored?: string[];
  analyzed?: boolean;
}
