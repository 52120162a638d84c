/**
 * Content-Type Validation
 * Decides which responses count as images and which extension they get
 */

const EXTENSIONS = new Map<string, string>([
  ["image/png", ".png"],
  ["image/jpeg", ".jpg"],
  ["image/jpg", ".jpg"],
  ["image/gif", ".gif"],
  ["image/webp", ".webp"],
  ["image/svg+xml", ".svg"],
  ["image/bmp", ".bmp"],
  ["image/tiff", ".tiff"],
  ["image/x-icon", ".ico"],
  ["image/vnd.microsoft.icon", ".ico"],
]);

export const DEFAULT_EXTENSION = ".bin";

export type ContentTypeValidation = { ok: true } | { ok: false; reason: string };

/**
 * Lower-case a content type and strip parameters such as `; charset=utf-8`
 */
export function normalizeContentType(contentType: string): string {
  const [mime = ""] = contentType.toLowerCase().split(";");
  return mime.trim();
}

export function validateContentType(contentType: string): ContentTypeValidation {
  if (!contentType) {
    return { ok: false, reason: "content-type header is missing" };
  }

  if (EXTENSIONS.has(normalizeContentType(contentType))) {
    return { ok: true };
  }

  return {
    ok: false,
    reason: `invalid content type for image: ${contentType} (expected image/*)`,
  };
}

/**
 * Extension for an accepted content type, or undefined when unknown
 */
export function extensionForContentType(contentType: string): string | undefined {
  if (!contentType) return undefined;
  return EXTENSIONS.get(normalizeContentType(contentType));
}

/**
 * @example
 * getExtensionFromContentType("image/jpeg; charset=utf-8") // ".jpg"
 * getExtensionFromContentType("text/html") // ".bin"
 */
export function getExtensionFromContentType(contentType: string): string {
  return extensionForContentType(contentType) ?? DEFAULT_EXTENSION;
}
