/**
 * Image storage backends
 */

export interface ImageStorage {
  /**
   * Persist one image. Resolves to the base64 encoding (memory) or the
   * written file path (disk).
   */
  store(data: Buffer, contentType: string, sourceUrl: string): Promise<string>;
  count(): number;
}

export { MemoryStorage } from "./memory";
export { DiskStorage } from "./disk";
export {
  generateFilename,
  extractExtensionFromUrl,
  determineExtension,
} from "./naming";
