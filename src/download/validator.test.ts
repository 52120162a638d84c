import { describe, it, expect } from "vitest";
import {
  extensionForContentType,
  getExtensionFromContentType,
  normalizeContentType,
  validateContentType,
} from "./validator";

const ACCEPTED = [
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
] as const;

describe("validateContentType", () => {
  it.each(ACCEPTED)("accepts %s", (contentType) => {
    expect(validateContentType(contentType)).toEqual({ ok: true });
  });

  it("ignores case and parameters", () => {
    expect(validateContentType("IMAGE/PNG; charset=utf-8")).toEqual({ ok: true });
  });

  it("rejects an empty content type", () => {
    expect(validateContentType("")).toEqual({
      ok: false,
      reason: "content-type header is missing",
    });
  });

  it("rejects non-image types", () => {
    expect(validateContentType("text/html; charset=utf-8")).toEqual({
      ok: false,
      reason:
        "invalid content type for image: text/html; charset=utf-8 (expected image/*)",
    });
  });

  it("rejects object prototype keys", () => {
    expect(validateContentType("constructor").ok).toBe(false);
  });
});

describe("getExtensionFromContentType", () => {
  it.each(ACCEPTED)("maps %s to %s", (contentType, extension) => {
    expect(getExtensionFromContentType(contentType)).toBe(extension);
  });

  it("maps every accepted type to a real extension", () => {
    for (const [contentType] of ACCEPTED) {
      expect(validateContentType(contentType).ok).toBe(true);
      expect(getExtensionFromContentType(contentType)).not.toBe(".bin");
    }
  });

  it.each(["", "application/pdf", "text/plain"])(
    "maps %j to .bin",
    (contentType) => {
      expect(getExtensionFromContentType(contentType)).toBe(".bin");
    },
  );
});

describe("extensionForContentType", () => {
  it("returns undefined for unknown types", () => {
    expect(extensionForContentType("application/pdf")).toBeUndefined();
    expect(extensionForContentType("")).toBeUndefined();
  });
});

describe("normalizeContentType", () => {
  it("strips parameters and whitespace", () => {
    expect(normalizeContentType(" Image/WebP ; q=0.9")).toBe("image/webp");
  });
});
