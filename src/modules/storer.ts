/**
 * Storer Module
 * Writes downloads to disk with --out, otherwise encodes them in memory
 */

import { resolve } from "path";
import { DiskStorage, MemoryStorage, type ImageStorage } from "../storage";
import { errorMessage } from "../utils/errors";
import { validateOutputPath } from "../utils/path-guard";
import type { PipelineContext } from "../types";

export async function store(ctx: PipelineContext): Promise<void> {
  if (!ctx.downloads) {
    throw new Error("Downloader must run before storer");
  }

  const { downloads, options, services, config, logger, tracker } = ctx;

  let storage: ImageStorage;
  if (options.out) {
    logger.info("Saving images to disk...");
    validateOutputPath(services.cwd, options.out);

    const disk = await DiskStorage.create(
      resolve(services.cwd, options.out),
      config.output.force,
    );
    ctx.storage = { mode: "disk", storage: disk };
    storage = disk;
  } else {
    logger.info("Encoding images to base64...");
    const memory = new MemoryStorage();
    ctx.storage = { mode: "memory", storage: memory };
    storage = memory;
  }

  // One at a time: file numbering depends on the running count
  const stored: string[] = [];
  for (const download of downloads) {
    try {
      stored.push(await storage.store(download.data, download.contentType, download.url));
      tracker.incrementImagesStored();
    } catch (error) {
      tracker.incrementStoresFailed();
      tracker.trackError(download.url, error, "storage");
      logger.warn(`Failed to save ${download.url}: ${errorMessage(error)}`);
    }
  }
  ctx.stored = stored;

  if (ctx.storage.mode === "disk") {
    for (const path of stored) logger.verbose(`Saved ${path}`);
    logger.success(`Saved ${stored.length} images to ${options.out}`);
    return;
  }

  stored.forEach((encoded, i) => {
    services.stdout.write(`Image ${i + 1} (base64): ${encoded}\n`);
  });
  logger.success(`Encoded ${stored.length} images to base64`);
}
