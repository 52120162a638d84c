/**
 * Downloader Module
 * Fetches every extracted URL and keeps the successful results
 */

import { Fetcher, type FetchSuccess } from "../download/fetcher";
import { timeoutError, validationError } from "../utils/errors";
import type { PipelineContext } from "../types";

const BYTES_PER_MB = 1024 * 1024;

export async function download(ctx: PipelineContext): Promise<void> {
  if (!ctx.urls) {
    throw new Error("Extractor must run before downloader");
  }

  const { urls, config, services, logger, tracker } = ctx;
  if (urls.length === 0) {
    ctx.results = [];
    ctx.downloads = [];
    return;
  }

  const settings = config.download;
  logger.info("Downloading images...");
  logger.debug(
    `Max size: ${settings.maxSize} MB, timeout: ${settings.timeout}s, concurrency: ${settings.concurrency}, retries: ${settings.retries}`,
  );

  const fetcher = new Fetcher({
    maxSize: Math.floor(settings.maxSize * BYTES_PER_MB),
    timeout: settings.timeout * 1000,
    concurrency: settings.concurrency,
    maxRetries: settings.retries,
    baseDelay: settings.baseDelay,
    maxDelay: settings.maxDelay,
    userAgent: settings.userAgent,
    reporter: services.reporter,
  });

  const results = await fetcher.fetchConcurrent(urls, services.signal);
  ctx.results = results;

  const downloads: FetchSuccess[] = [];
  for (const result of results) {
    if (result.ok) {
      downloads.push(result);
      tracker.incrementImagesDownloaded(result.size);
      logger.debug(`Downloaded ${result.url} (${result.size} bytes, ${result.contentType})`);
    } else {
      tracker.incrementImagesFailed();
      tracker.trackError(result.url, result.error, "image");
      logger.verbose(`Failed to download ${result.url}: ${result.error.message}`);
    }
  }

  // Results arrive in completion order; store in extraction order
  const position = new Map(urls.map((url, i) => [url, i]));
  downloads.sort((a, b) => (position.get(a.url) ?? 0) - (position.get(b.url) ?? 0));
  ctx.downloads = downloads;

  if (downloads.length === 0) {
    if (results.every((r) => !r.ok && r.error.reason === "timeout")) {
      throw timeoutError(`All ${urls.length} image downloads timed out`);
    }
    throw validationError(
      "No images could be downloaded",
      `Check that the URLs are accessible and contain valid images. Common issues: network connectivity, rate limiting, invalid URLs, or files too large (current limit: ${settings.maxSize}MB). Use --debug for details`,
    );
  }

  logger.success(`Downloaded ${downloads.length}/${urls.length} images successfully`);
}
