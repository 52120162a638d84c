/**
 * Memory Storage
 * Keeps images as base64 strings for printing or data URLs
 */

import { normalizeContentType } from "../download/validator";
import { validationError } from "../utils/errors";
import type { ImageStorage } from "./index";

interface StoredImage {
  encoded: string;
  contentType: string;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export class MemoryStorage implements ImageStorage {
  private images: StoredImage[] = [];

  async store(data: Buffer, contentType: string, _sourceUrl: string): Promise<string> {
    if (data.length === 0) throw validationError("cannot store empty data");

    const encoded = data.toString("base64");
    this.images.push({ encoded, contentType });
    return encoded;
  }

  getImages(): string[] {
    return this.images.map((image) => image.encoded);
  }

  /**
   * @example
   * // after store(Buffer.from("hi"), "image/png; q=1", url)
   * storage.getDataUrls() // ["data:image/png;base64,aGk="]
   */
  getDataUrls(): string[] {
    return this.images.map(({ encoded, contentType }) => {
      const mime = normalizeContentType(contentType) || "application/octet-stream";
      return `data:${mime};base64,${encoded}`;
    });
  }

  count(): number {
    return this.images.length;
  }

  clear(): void {
    this.images = [];
  }

  getImageData(encoded: string): Buffer {
    if (!encoded) throw validationError("encoded string cannot be empty");
    if (encoded.length % 4 !== 0 || !BASE64.test(encoded)) {
      throw validationError("failed to decode base64 string: malformed input");
    }
    return Buffer.from(encoded, "base64");
  }

  /**
   * Decoded byte total, estimated from the encoded lengths
   */
  estimateMemoryUsage(): number {
    return this.images.reduce(
      (total, { encoded }) => total + Math.floor((encoded.length * 3) / 4),
      0,
    );
  }
}
