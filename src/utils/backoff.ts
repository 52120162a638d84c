/**
 * Retry Backoff
 * Exponential backoff shared by the image downloader and the GitHub client
 */

export interface BackoffPolicy {
  baseDelay: number;
  maxDelay: number;
}

/**
 * Delay before the retry that follows `attempt` (0-based):
 * `baseDelay * 2^attempt` plus up to 25% jitter, capped at `maxDelay`
 *
 * @example
 * calculateBackoffDelay(2, { baseDelay: 500, maxDelay: 10000 }, () => 0) // 2000
 */
export function calculateBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const delay = policy.baseDelay * Math.pow(2, attempt);
  const jitter = Math.floor(delay * 0.25 * random());
  return Math.min(delay + jitter, policy.maxDelay);
}

/**
 * Wait for `ms`, waking early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timeoutId = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
