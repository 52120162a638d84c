/**
 * Utility exports
 */

// Errors
export {
  AppError,
  analysisError,
  authError,
  errorMessage,
  filesystemError,
  getExitCode,
  isAppError,
  networkError,
  securityError,
  timeoutError,
  validationError,
} from "./errors";
export type { ErrorKind } from "./errors";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { validatePath, validateOutputPath } from "./path-guard";

// Process utilities
export { CommandError, ProcessRunner } from "./exec";
export type { CommandRunner, CommandResult } from "./exec";

// Retry utilities
export { calculateBackoffDelay, sleep } from "./backoff";
export type { BackoffPolicy } from "./backoff";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig, mergeConfig } from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
