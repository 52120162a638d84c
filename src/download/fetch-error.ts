export type FetchErrorReason =
  | "invalid-url"
  | "network"
  | "timeout"
  | "http-status"
  | "content-type"
  | "too-large"
  | "read"
  | "cancelled";

interface FetchErrorOptions {
  attempts: number;
  status?: number;
  cause?: unknown;
}

/**
 * Terminal failure for a single URL. Carried inside a FetchResult and
 * never thrown out of the fetcher.
 */
export class FetchError extends Error {
  readonly reason: FetchErrorReason;
  readonly attempts: number;
  readonly status?: number;

  constructor(
    message: string,
    reason: FetchErrorReason,
    options: FetchErrorOptions,
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.reason = reason;
    this.attempts = options.attempts;
    this.status = options.status;
  }
}
