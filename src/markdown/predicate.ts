const IMAGE_SCHEMES = ["http://", "https://", "data:image/"];

/**
 * Permissive "could this be an image reference" check.
 * Only the scheme is enforced; extension and host are left to the
 * content-type check at download time.
 *
 * @example
 * looksLikeImageUrl("https://example.com/page") // true
 * looksLikeImageUrl("data:image/png;base64,AAAA") // true
 * looksLikeImageUrl("./relative.png") // false
 */
export function looksLikeImageUrl(url: string): boolean {
  if (!url) return false;
  const lower = url.toLowerCase();
  return IMAGE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}
