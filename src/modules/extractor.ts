/**
 * Extractor Module
 * Pulls image URLs out of every collected document
 */

import { formatTarget } from "../github/target";
import { deduplicateUrls, extractImageUrls } from "../markdown/scanner";
import type { PipelineContext } from "../types";

export async function extract(ctx: PipelineContext): Promise<void> {
  if (!ctx.documents || !ctx.target) {
    throw new Error("Collector must run before extractor");
  }

  const { documents, logger, tracker } = ctx;
  logger.info("Extracting image URLs from markdown...");

  const found: string[] = [];
  for (const document of documents) {
    const urls = extractImageUrls(document.body);
    logger.debug(`Found ${urls.length} URLs in ${document.label}`);
    for (const url of urls) logger.debug(`  ${url}`);
    found.push(...urls);
  }

  // The same screenshot is often quoted in several comments
  const urls = deduplicateUrls(found);
  ctx.urls = urls;
  tracker.setUrlsFound(urls.length);

  if (urls.length === 0) {
    logger.warn(`No images found in issue/PR ${formatTarget(ctx.target)}`);
    return;
  }
  logger.success(`Found ${urls.length} image URLs`);
}
