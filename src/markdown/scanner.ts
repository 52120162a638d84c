/**
 * Markdown Image Scanner
 * Extracts candidate image URLs from issue and comment bodies
 */

import { Marked } from "marked";
import { load } from "cheerio";
import { looksLikeImageUrl } from "./predicate";
import { extractWithPatterns, resolveReferenceImages } from "./patterns";

const lexer = new Marked({ gfm: true });

/**
 * Collect image URLs from `<img>` tags inside a raw HTML fragment
 */
function extractFromHtml(html: string): string[] {
  const $ = load(html);
  const urls: string[] = [];
  $("img").each((_i, el) => {
    const src = $(el).attr("src");
    if (src) urls.push(src);
  });
  return urls;
}

/**
 * Walk the lexed token tree and collect image destinations.
 * Code spans and fenced blocks never produce image tokens.
 */
function extractFromTokens(content: string): string[] {
  const urls: string[] = [];
  const tokens = lexer.lexer(content);

  lexer.walkTokens(tokens, (token) => {
    if (token.type === "image" && typeof token.href === "string") {
      urls.push(token.href);
    } else if (token.type === "html" && typeof token.text === "string") {
      urls.push(...extractFromHtml(token.text));
    }
  });

  return urls.filter((url) => url !== "" && looksLikeImageUrl(url));
}

/**
 * Remove duplicates while keeping first-seen order
 */
export function deduplicateUrls(urls: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const url of urls) {
    const normalized = url.trim();
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }

  return result;
}

/**
 * Extract every image URL referenced in a markdown document
 *
 * Combines a structural parse with permissive regex fallbacks, so the
 * result may contain false positives. Final admission happens when the
 * downloader validates the content type.
 *
 * @example
 * extractImageUrls("![logo](https://example.com/logo.png)")
 * // => ["https://example.com/logo.png"]
 */
export function extractImageUrls(content: string): string[] {
  if (!content) return [];

  return deduplicateUrls([
    ...extractFromTokens(content),
    ...extractWithPatterns(content),
    ...resolveReferenceImages(content),
  ]);
}
