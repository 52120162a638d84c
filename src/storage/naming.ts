/**
 * Storage Naming
 * Sequential filenames and extension selection for stored images
 */

import { posix } from "node:path";
import { DEFAULT_EXTENSION, extensionForContentType } from "../download/validator";

const URL_EXTENSIONS = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
  ".svg",
  ".bmp",
  ".tiff",
  ".ico",
]);

/**
 * @example
 * generateFilename(0, ".png") // "img-01.png"
 * generateFilename(99, "webp") // "img-100.webp"
 */
export function generateFilename(index: number, extension: string): string {
  let ext = extension || DEFAULT_EXTENSION;
  if (!ext.startsWith(".")) ext = `.${ext}`;
  return `img-${String(index + 1).padStart(2, "0")}${ext}`;
}

/**
 * Known image extension of the URL path, or "" when there is none
 */
export function extractExtensionFromUrl(url: string): string {
  const [path = ""] = url.split(/[?#]/);
  const ext = posix.extname(path).toLowerCase();
  return URL_EXTENSIONS.has(ext) ? ext : "";
}

/**
 * Content type wins over the URL; `.bin` when neither is known
 */
export function determineExtension(contentType: string, url: string): string {
  return (
    extensionForContentType(contentType) ||
    extractExtensionFromUrl(url) ||
    DEFAULT_EXTENSION
  );
}
