/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  DownloadConfig,
  GitHubConfig,
  OutputConfig,
  LoggingConfig,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Context
export type {
  PipelineContext,
  PipelineServices,
  RunOptions,
  SourceDocument,
  StorageState,
  Issue,
  IssueType,
  ImageIssue,
  StorageIssue,
  ResourceIssue,
  ImageIssueReason,
  StorageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
