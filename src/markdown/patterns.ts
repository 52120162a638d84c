/**
 * Fallback Patterns
 * Regex battery used to recover image URLs the markdown lexer misses on
 * malformed input. Matches inside code spans and fenced blocks are NOT
 * filtered out here.
 */

import { load } from "cheerio";
import { looksLikeImageUrl } from "./predicate";

// ============================================================================
// Patterns
// ============================================================================

/** Characters that terminate a bare URL */
const URL_BODY = `[^\\s)"'<>]`;

const MARKDOWN_IMAGE = /!\[[^\]]*\]\(([^)]+)\)/g;

const HTML_IMG = /<img[^>]+src=["']([^"']+)["'][^>]*>/gi;

const GITHUB_ASSET = new RegExp(
  `https://github\\.com/[^/\\s]+/[^/\\s]+/assets/${URL_BODY}+`,
  "g",
);

const GITHUB_USER_ATTACHMENT = new RegExp(
  `https://github\\.com/user-attachments/assets/${URL_BODY}+`,
  "g",
);

const GITHUB_USER_CONTENT = new RegExp(
  `https://[^/\\s]*githubusercontent\\.com/${URL_BODY}+`,
  "g",
);

const HTTP_IMAGE = new RegExp(
  `https?://${URL_BODY}+(?:\\.(?:png|jpe?g|gif|webp|svg|bmp|tiff)(?:\\?${URL_BODY}*)?|/(?:images?|img|assets|uploads)/${URL_BODY}+)`,
  "gi",
);

const REFERENCE_DEFINITION = /^\s*\[([^\]]+)\]:\s*(\S+)/;

const REFERENCE_USAGE = /!\[[^\]]*\]\[([^\]]+)\]/g;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Strip an optional title and angle brackets from an inline image target
 *
 * @example
 * cleanInlineTarget('<https://x.dev/a.png> "Logo"') // "https://x.dev/a.png"
 */
function cleanInlineTarget(target: string): string {
  const [first = ""] = target.trim().split(/\s+/);
  return first.replace(/^<(.*)>$/, "$1");
}

/**
 * Rewrite each `<img>` tag with its entity-decoded `src`, so the regex pass
 * reports the same URL the HTML parser does
 *
 * @example
 * decodeImageTags('<img src="a.png?w=1&amp;h=2">') // '<img src="a.png?w=1&h=2">'
 */
function decodeImageTags(content: string): string {
  return content.replace(HTML_IMG, (tag) => {
    const src = load(tag)("img").attr("src");
    if (!src) return tag;
    const quote = src.includes('"') ? "'" : '"';
    return `<img src=${quote}${src}${quote}>`;
  });
}

function collect(
  content: string,
  pattern: RegExp,
  pick: (match: RegExpMatchArray) => string,
): string[] {
  const urls: string[] = [];
  for (const match of content.matchAll(pattern)) {
    const url = pick(match).trim();
    if (url && looksLikeImageUrl(url)) {
      urls.push(url);
    }
  }
  return urls;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Run every fallback pattern over the raw text, in a fixed order
 */
export function extractWithPatterns(raw: string): string[] {
  const content = decodeImageTags(raw);
  return [
    ...collect(content, MARKDOWN_IMAGE, (m) => cleanInlineTarget(m[1] ?? "")),
    ...collect(content, HTML_IMG, (m) => m[1] ?? ""),
    ...collect(content, GITHUB_ASSET, (m) => m[0]),
    ...collect(content, GITHUB_USER_ATTACHMENT, (m) => m[0]),
    ...collect(content, GITHUB_USER_CONTENT, (m) => m[0]),
    ...collect(content, HTTP_IMAGE, (m) => m[0]),
  ];
}

/**
 * Collect `[key]: url "title"` definitions, keyed case-insensitively.
 * A later definition of the same key wins.
 */
export function extractReferences(content: string): Map<string, string> {
  const references = new Map<string, string>();

  for (const line of content.split("\n")) {
    const match = line.match(REFERENCE_DEFINITION);
    if (!match) continue;

    const key = (match[1] ?? "").trim().toLowerCase();
    const url = (match[2] ?? "")
      .replace(/^<(.*)>$/, "$1")
      .replace(/^["']+|["']+$/g, "");

    if (key && url) {
      references.set(key, url);
    }
  }

  return references;
}

/**
 * Resolve `![alt][key]` usages against the collected definitions
 */
export function resolveReferenceImages(content: string): string[] {
  const references = extractReferences(content);
  if (references.size === 0) return [];

  return collect(content, REFERENCE_USAGE, (m) => {
    const key = (m[1] ?? "").trim().toLowerCase();
    return references.get(key) ?? "";
  });
}
