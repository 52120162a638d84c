/**
 * Analyzer Module
 * Sends stored images to the analysis sink when a prompt was given
 */

import { sanitizePrompt, validateAnalysisInput } from "../claude/executor";
import { formatTarget } from "../github/target";
import type { Logger } from "../utils/logger";
import type { PipelineContext } from "../types";

function warnSensitiveData(logger: Logger, target: string, count: number): void {
  logger.warn("SECURITY WARNING: you are about to send image data to Claude");
  logger.warn(`  Repository: ${target}`);
  logger.warn(`  Image count: ${count}`);
  logger.warn("  These images may contain API keys, internal details or personal information");
  logger.warn("  Review all images before proceeding");
}

export async function analyze(ctx: PipelineContext): Promise<void> {
  const prompt = ctx.options.send;
  if (prompt === undefined) return;

  if (!ctx.storage || !ctx.stored || !ctx.target) {
    throw new Error("Storer must run before analyzer");
  }

  const { storage, stored, services, logger, options } = ctx;
  logger.info("Sending to Claude...");
  warnSensitiveData(logger, formatTarget(ctx.target), stored.length);

  await services.sink.checkAvailable();

  // Files are passed by path; memory images travel as data URLs
  const images = storage.mode === "disk" ? stored : storage.storage.getDataUrls();

  const sanitized = sanitizePrompt(prompt);
  validateAnalysisInput(sanitized, images);
  logger.debug(
    `Executing Claude with prompt length ${sanitized.length}, image count ${images.length}`,
  );

  await services.sink.execute(sanitized, images, options.continueSession);
  ctx.analyzed = true;
  logger.success("Claude analysis complete");
}
