import { describe, it, expect } from "vitest";
import { deduplicateUrls, extractImageUrls } from "./scanner";
import { extractReferences, resolveReferenceImages } from "./patterns";
import { looksLikeImageUrl } from "./predicate";

describe("extractImageUrls", () => {
  it("returns an empty list for empty input", () => {
    expect(extractImageUrls("")).toEqual([]);
  });

  it("extracts an inline image", () => {
    expect(extractImageUrls("![logo](https://example.com/logo.png)")).toEqual([
      "https://example.com/logo.png",
    ]);
  });

  it("drops the title of an inline image", () => {
    expect(
      extractImageUrls('![a](https://example.com/a.png "Title")'),
    ).toEqual(["https://example.com/a.png"]);
  });

  it("decodes entities in html src attributes once", () => {
    expect(
      extractImageUrls(
        '<img width="300" src="https://cdn.example.com/shot.png?w=1&amp;h=2">',
      ),
    ).toEqual(["https://cdn.example.com/shot.png?w=1&h=2"]);
  });

  it("keeps query strings", () => {
    expect(
      extractImageUrls("![q](https://example.com/a.png?raw=true)"),
    ).toEqual(["https://example.com/a.png?raw=true"]);
  });

  it("deduplicates while preserving first-seen order", () => {
    const content = [
      "First ![a](https://example.com/one.png)",
      "",
      '<img src="https://example.com/two.jpg" width="100">',
      "",
      "Then ![b](https://example.com/one.png) and ![c](https://example.com/three.gif)",
    ].join("\n");

    expect(extractImageUrls(content)).toEqual([
      "https://example.com/one.png",
      "https://example.com/two.jpg",
      "https://example.com/three.gif",
    ]);
  });

  it("finds img tags nested in html blocks", () => {
    const content =
      '<p align="center"><img width="300" alt="x" src="https://example.com/centered.png"></p>';
    expect(extractImageUrls(content)).toEqual([
      "https://example.com/centered.png",
    ]);
  });

  it("resolves reference-style images case-insensitively", () => {
    const content = [
      "![Screenshot][shot]",
      "",
      '[Shot]: https://example.com/shot.png "The shot"',
    ].join("\n");

    expect(extractImageUrls(content)).toEqual([
      "https://example.com/shot.png",
    ]);
  });

  it("recovers urls from an unclosed image", () => {
    expect(extractImageUrls("![broken](https://example.com/a.png")).toEqual([
      "https://example.com/a.png",
    ]);
  });

  it("matches GitHub attachment urls without an extension", () => {
    expect(
      extractImageUrls(
        "See https://github.com/user-attachments/assets/1234-abcd for details",
      ),
    ).toEqual(["https://github.com/user-attachments/assets/1234-abcd"]);
  });

  it("matches GitHub user content urls without an extension", () => {
    expect(
      extractImageUrls("https://user-images.githubusercontent.com/123/abc-def"),
    ).toEqual(["https://user-images.githubusercontent.com/123/abc-def"]);
  });

  it("matches bare urls with an uploads segment", () => {
    expect(
      extractImageUrls("Logs at https://example.com/uploads/report"),
    ).toEqual(["https://example.com/uploads/report"]);
  });

  it("ignores bare urls without image indicators", () => {
    expect(extractImageUrls("Docs at https://example.com/page")).toEqual([]);
  });

  it("ignores relative image paths", () => {
    expect(
      extractImageUrls("![local](./images/a.png) ![rel](/img/b.png)"),
    ).toEqual([]);
  });

  it("accepts data urls", () => {
    expect(
      extractImageUrls("![dot](data:image/png;base64,iVBORw0KGgo=)"),
    ).toEqual(["data:image/png;base64,iVBORw0KGgo="]);
  });

  // The fallback patterns do not know about code context, so urls inside
  // code spans and fenced blocks are still returned.
  describe("code blocks", () => {
    it("returns urls inside inline code spans", () => {
      expect(
        extractImageUrls("Use `![x](https://example.com/code.png)` syntax"),
      ).toEqual(["https://example.com/code.png"]);
    });

    it("returns urls inside fenced code blocks", () => {
      const content = [
        "```md",
        "![x](https://example.com/fenced.png)",
        "```",
      ].join("\n");
      expect(extractImageUrls(content)).toEqual([
        "https://example.com/fenced.png",
      ]);
    });
  });

  it("never returns duplicates", () => {
    const content = [
      "![a](https://example.com/a.png) ![a](https://example.com/a.png)",
      '<img src="https://example.com/a.png">',
      "https://example.com/a.png https://example.com/images/b",
      "![r][ref]",
      "[ref]: https://example.com/images/b",
    ].join("\n");

    const urls = extractImageUrls(content);
    expect(new Set(urls).size).toBe(urls.length);
    expect(urls).toEqual([
      "https://example.com/a.png",
      "https://example.com/images/b",
    ]);
  });
});

describe("reference definitions", () => {
  it("strips angle brackets and titles", () => {
    const content = "![x][Logo]\n[logo]: <https://cdn.example.com/logo> 'Title'";
    expect(resolveReferenceImages(content)).toEqual([
      "https://cdn.example.com/logo",
    ]);
  });

  it("lets a later definition replace an earlier one", () => {
    const refs = extractReferences(
      "[a]: https://example.com/one.png\n[A]: https://example.com/two.png",
    );
    expect(refs.get("a")).toBe("https://example.com/two.png");
  });

  it("ignores usages without a definition", () => {
    expect(resolveReferenceImages("![x][missing]\n[other]: https://x.dev/a.png")).toEqual([]);
  });
});

describe("deduplicateUrls", () => {
  it("trims and drops empty entries", () => {
    expect(deduplicateUrls([" https://a.dev/x.png ", "", "https://a.dev/x.png"])).toEqual([
      "https://a.dev/x.png",
    ]);
  });
});

describe("looksLikeImageUrl", () => {
  it.each([
    ["https://example.com/page", true],
    ["HTTP://EXAMPLE.COM/A.PNG", true],
    ["data:image/gif;base64,R0lG", true],
    ["data:text/plain,hello", false],
    ["ftp://example.com/a.png", false],
    ["", false],
  ])("%s -> %s", (url, expected) => {
    expect(looksLikeImageUrl(url)).toBe(expected);
  });
});
