/**
 * Application Errors
 * Typed failures with a user-facing suggestion and a process exit code
 */

export type ErrorKind =
  | "generic"
  | "validation"
  | "network"
  | "filesystem"
  | "auth"
  | "timeout"
  | "security"
  | "analysis";

const EXIT_CODES: Record<ErrorKind, number> = {
  generic: 1,
  validation: 1,
  network: 2,
  filesystem: 3,
  auth: 4,
  timeout: 5,
  security: 6,
  analysis: 7,
};

interface AppErrorOptions {
  suggestion?: string;
  cause?: unknown;
}

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly suggestion?: string;
  readonly exitCode: number;

  constructor(kind: ErrorKind, message: string, options: AppErrorOptions = {}) {
    super(withCause(message, options.cause), { cause: options.cause });
    this.name = "AppError";
    this.kind = kind;
    this.suggestion = options.suggestion;
    this.exitCode = EXIT_CODES[kind];
  }

  /**
   * Message plus the suggestion line, for terminal output
   */
  format(): string {
    return this.suggestion
      ? `${this.message}\nSuggestion: ${this.suggestion}`
      : this.message;
  }
}

function withCause(message: string, cause: unknown): string {
  if (cause === undefined) return message;
  return `${message}: ${errorMessage(cause)}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * First suggestion whose needle appears in the message or its cause
 */
function pickSuggestion(
  message: string,
  cause: unknown,
  rules: Array<[string[], string]>,
  fallback: string,
): string {
  const text = withCause(message, cause).toLowerCase();
  const match = rules.find(([needles]) => needles.some((n) => text.includes(n)));
  return match ? match[1] : fallback;
}

// ============================================================================
// Factories
// ============================================================================

export function validationError(message: string, suggestion?: string): AppError {
  return new AppError("validation", message, { suggestion });
}

export function networkError(message: string, cause?: unknown): AppError {
  const suggestion = pickSuggestion(
    message,
    cause,
    [
      [
        ["rate limit"],
        "GitHub API rate limit exceeded. Wait a few minutes before retrying",
      ],
      [
        ["timeout", "timed out"],
        "Request timed out. Try a larger --timeout or check your network connection",
      ],
      [
        ["authentication", "401"],
        "Authentication failed. Run 'gh auth login' to authenticate with GitHub",
      ],
      [
        ["not found", "404"],
        "Resource not found. Check that the repository and issue/PR number are correct and accessible",
      ],
      [
        ["forbidden", "403"],
        "Access forbidden. You may not have permission to access this repository",
      ],
    ],
    "Check your internet connection and try again",
  );
  return new AppError("network", message, { suggestion, cause });
}

export function filesystemError(message: string, cause?: unknown): AppError {
  const suggestion = pickSuggestion(
    message,
    cause,
    [
      [
        ["permission denied", "eacces", "eperm"],
        "Permission denied. Check that you have write access to the target directory",
      ],
      [
        ["no space left", "enospc"],
        "Insufficient disk space. Free up some space or choose a different output directory",
      ],
      [
        ["already exists", "eexist"],
        "File already exists. Use --force to overwrite existing files",
      ],
      [
        ["no such file or directory", "enoent"],
        "Directory does not exist. Create it first or use a valid output path",
      ],
      [["is a directory", "eisdir"], "Target is a directory. Choose a different name"],
    ],
    "Check file permissions and available disk space",
  );
  return new AppError("filesystem", message, { suggestion, cause });
}

export function authError(message: string): AppError {
  return new AppError("auth", message, {
    suggestion: "Run 'gh auth login' to authenticate with GitHub",
  });
}

export function timeoutError(message: string): AppError {
  return new AppError("timeout", message, {
    suggestion:
      "Try a larger --timeout or check your network connection. For large images, consider --max-size",
  });
}

export function securityError(message: string): AppError {
  return new AppError("security", message, {
    suggestion:
      "This operation was blocked for security reasons. Review the input and make sure you trust it",
  });
}

export function analysisError(message: string, cause?: unknown): AppError {
  const suggestion = pickSuggestion(
    message,
    cause,
    [
      [
        ["not found", "enoent"],
        "Claude CLI not found. Install it or remove the --send flag",
      ],
      [
        ["permission denied", "eacces"],
        "Permission denied running the claude command. Check that it is executable",
      ],
      [
        ["authentication", "unauthorized"],
        "Claude authentication failed. Check your credentials",
      ],
      [
        ["timeout", "timed out"],
        "Claude request timed out. The images may be too large or the service busy",
      ],
      [["rate limit"], "Claude rate limit exceeded. Wait a few minutes before retrying"],
    ],
    "Check that the Claude CLI is installed. Run 'claude --version' to verify",
  );
  return new AppError("analysis", message, { suggestion, cause });
}

/**
 * Exit code for any thrown value; 1 for anything that is not an AppError
 */
export function getExitCode(error: unknown): number {
  return error instanceof AppError ? error.exitCode : 1;
}

export function isAppError(error: unknown, kind?: ErrorKind): error is AppError {
  return error instanceof AppError && (kind === undefined || error.kind === kind);
}
