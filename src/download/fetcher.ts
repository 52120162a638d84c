/**
 * Concurrent Image Fetcher
 * Downloads image URLs under a worker pool with size, time and
 * content-type guards, retrying transient failures with backoff
 */

import { calculateBackoffDelay, sleep } from "../utils/backoff";
import { FetchError, type FetchErrorReason } from "./fetch-error";
import { NoopReporter, type ProgressReporter } from "./progress";
import { validateContentType } from "./validator";

// ============================================================================
// Types
// ============================================================================

export interface FetchSuccess {
  ok: true;
  url: string;
  data: Buffer;
  contentType: string;
  size: number;
}

export interface FetchFailure {
  ok: false;
  url: string;
  error: FetchError;
}

export type FetchResult = FetchSuccess | FetchFailure;

export interface FetcherOptions {
  /** Byte ceiling per image */
  maxSize: number;
  /** Per-attempt timeout in milliseconds, covering the body read */
  timeout: number;
  concurrency: number;
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  userAgent?: string;
  reporter?: ProgressReporter;
}

type AttemptOutcome =
  | { kind: "success"; data: Buffer; contentType: string }
  | {
      kind: "failure";
      reason: FetchErrorReason;
      detail: string;
      retryable: boolean;
      status?: number;
      cause?: unknown;
    };

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY = 500;
export const DEFAULT_MAX_DELAY = 10000;
export const DEFAULT_USER_AGENT = "issue-images/1.0";

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const RETRYABLE_SIGNATURES = [
  "connection refused",
  "econnrefused",
  "connection reset",
  "econnreset",
  "other side closed",
  "socket hang up",
  "timeout",
  "etimedout",
  "temporary failure",
  "network is unreachable",
  "enetunreach",
  "no such host",
  "enotfound",
  "eai_again",
];

// ============================================================================
// Helpers
// ============================================================================

/**
 * Flatten an error and its cause chain into one line
 *
 * @example
 * // fetch() rejects with TypeError("fetch failed") caused by ECONNREFUSED
 * describeError(err) // "fetch failed: connect ECONNREFUSED 127.0.0.1:9"
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  const parts = [error.message];
  let cause = error.cause;
  while (cause instanceof Error) {
    parts.push(cause.message);
    cause = cause.cause;
  }
  return parts.join(": ");
}

export function isRetryableError(detail: string): boolean {
  const lower = detail.toLowerCase();
  return RETRYABLE_SIGNATURES.some((signature) => lower.includes(signature));
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

function failure(
  reason: FetchErrorReason,
  detail: string,
  retryable: boolean,
  extra: { status?: number; cause?: unknown } = {},
): AttemptOutcome {
  return { kind: "failure", reason, detail, retryable, ...extra };
}

/**
 * Read a response body, stopping once more than `limit` bytes arrive.
 * The returned buffer is at most `limit + 1` bytes long.
 */
async function readLimited(response: Response, limit: number): Promise<Buffer> {
  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    chunks.push(value);
    total += value.byteLength;

    if (total > limit) {
      await reader.cancel();
      break;
    }
  }

  return Buffer.concat(chunks, Math.min(total, limit + 1));
}

function terminalMessage(
  reason: FetchErrorReason,
  detail: string,
  attempts: number,
): string {
  switch (reason) {
    case "network":
    case "timeout":
      return `HTTP request failed after ${attempts} attempts: ${detail}`;
    case "http-status":
      return `${detail} (after ${attempts} attempts)`;
    case "read":
      return `failed to read response body after ${attempts} attempts: ${detail}`;
    default:
      return detail;
  }
}

// ============================================================================
// Fetcher
// ============================================================================

export class Fetcher {
  private readonly maxSize: number;
  private readonly timeout: number;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly baseDelay: number;
  private readonly maxDelay: number;
  private readonly userAgent: string;
  private readonly reporter: ProgressReporter;

  constructor(options: FetcherOptions) {
    if (options.maxSize <= 0) {
      throw new Error(`maxSize must be positive, got ${options.maxSize}`);
    }
    if (options.concurrency < 1) {
      throw new Error(`concurrency must be at least 1, got ${options.concurrency}`);
    }

    this.maxSize = options.maxSize;
    this.timeout = options.timeout;
    this.concurrency = Math.floor(options.concurrency);
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.baseDelay = options.baseDelay ?? DEFAULT_BASE_DELAY;
    this.maxDelay = options.maxDelay ?? DEFAULT_MAX_DELAY;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.reporter = options.reporter ?? new NoopReporter();
  }

  /**
   * Download every URL. Returns exactly one result per input URL, in
   * completion order; correlate by `result.url`.
   */
  async fetchConcurrent(urls: string[], signal?: AbortSignal): Promise<FetchResult[]> {
    if (urls.length === 0) return [];

    const results: FetchResult[] = [];
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < urls.length) {
        const url = urls[cursor++];
        const result = signal?.aborted
          ? this.cancelled(url, 0)
          : await this.fetchSingle(url, signal);

        results.push(result);
        const completed = results.length;
        this.report(() =>
          this.reporter.update(
            completed,
            result.url,
            result.ok,
            result.ok ? undefined : result.error,
          ),
        );
      }
    };

    this.report(() => this.reporter.start(urls.length));
    try {
      const workers = Math.min(this.concurrency, urls.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      this.report(() => this.reporter.finish());
    }

    return results;
  }

  /**
   * Progress output never decides the outcome of a batch
   */
  private report(call: () => void): void {
    try {
      call();
    } catch {
      // display failures are ignored
    }
  }

  /**
   * Download one URL with retries. Never rejects.
   */
  async fetchSingle(url: string, signal?: AbortSignal): Promise<FetchResult> {
    if (!isValidUrl(url)) {
      return {
        ok: false,
        url,
        error: new FetchError(`invalid URL: ${url}`, "invalid-url", { attempts: 0 }),
      };
    }

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) return this.cancelled(url, attempt);

      const outcome = await this.attemptOnce(url, signal).catch(
        (error: unknown): AttemptOutcome =>
          failure("network", describeError(error), false, { cause: error }),
      );

      if (outcome.kind === "success") {
        return {
          ok: true,
          url,
          data: outcome.data,
          contentType: outcome.contentType,
          size: outcome.data.length,
        };
      }

      if (outcome.reason === "cancelled") {
        return this.cancelled(url, attempt + 1);
      }

      if (outcome.retryable && attempt < this.maxRetries) {
        await sleep(
          calculateBackoffDelay(attempt, {
            baseDelay: this.baseDelay,
            maxDelay: this.maxDelay,
          }),
          signal,
        );
        continue;
      }

      const attempts = attempt + 1;
      return {
        ok: false,
        url,
        error: new FetchError(
          terminalMessage(outcome.reason, outcome.detail, attempts),
          outcome.reason,
          { attempts, status: outcome.status, cause: outcome.cause },
        ),
      };
    }
  }

  private cancelled(url: string, attempts: number): FetchFailure {
    return {
      ok: false,
      url,
      error: new FetchError("download cancelled", "cancelled", { attempts }),
    };
  }

  private async attemptOnce(url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    const interrupted = (): AttemptOutcome | undefined => {
      if (signal?.aborted) return failure("cancelled", "download cancelled", false);
      if (timedOut) {
        return failure("timeout", `request timed out after ${this.timeout}ms`, true);
      }
      return undefined;
    };

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: { "User-Agent": this.userAgent },
          signal: controller.signal,
        });
      } catch (error) {
        const detail = describeError(error);
        return (
          interrupted() ??
          failure("network", detail, isRetryableError(detail), { cause: error })
        );
      }

      if (response.status !== 200) {
        await response.body?.cancel();
        return failure(
          "http-status",
          `HTTP ${response.status}: ${response.statusText}`,
          isRetryableStatus(response.status),
          { status: response.status },
        );
      }

      const contentType = response.headers.get("content-type") ?? "";
      const validation = validateContentType(contentType);
      if (!validation.ok) {
        await response.body?.cancel();
        return failure("content-type", validation.reason, false);
      }

      const declaredLength = Number(response.headers.get("content-length") ?? "");
      if (declaredLength > this.maxSize) {
        await response.body?.cancel();
        return failure(
          "too-large",
          `file too large: ${declaredLength} bytes (max ${this.maxSize})`,
          false,
        );
      }

      let data: Buffer;
      try {
        data = await readLimited(response, this.maxSize);
      } catch (error) {
        return (
          interrupted() ??
          failure("read", describeError(error), true, { cause: error })
        );
      }

      if (data.length > this.maxSize) {
        return failure(
          "too-large",
          `file too large: ${data.length} bytes (max ${this.maxSize})`,
          false,
        );
      }

      return { kind: "success", data, contentType };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Fetcher with the default retry policy
 */
export function createFetcher(
  maxSize: number,
  timeout: number,
  concurrency: number,
): Fetcher {
  return new Fetcher({ maxSize, timeout, concurrency });
}
