/**
 * Disk Storage
 * Writes images as img-NN.<ext> files into one output directory
 */

import { mkdir, stat, unlink, writeFile } from "fs/promises";
import { join, normalize } from "path";
import { fileExists } from "../utils/file-exists";
import { AppError, errorMessage, filesystemError, validationError } from "../utils/errors";
import { determineExtension, generateFilename } from "./naming";
import type { ImageStorage } from "./index";

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export class DiskStorage implements ImageStorage {
  private files: string[] = [];

  private constructor(
    private readonly outputDir: string,
    private readonly force: boolean,
  ) {}

  /**
   * Create the output directory (recursively) and a storage writing into it
   */
  static async create(outputDir: string, force: boolean): Promise<DiskStorage> {
    if (!outputDir) throw validationError("output directory cannot be empty");

    const dir = normalize(outputDir);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw filesystemError(`failed to create output directory ${dir}`, error);
    }
    return new DiskStorage(dir, force);
  }

  async store(data: Buffer, contentType: string, sourceUrl: string): Promise<string> {
    if (data.length === 0) throw validationError("cannot store empty data");

    const filename = generateFilename(
      this.files.length,
      determineExtension(contentType, sourceUrl),
    );
    const path = join(this.outputDir, filename);

    try {
      await writeFile(path, data, { flag: this.force ? "w" : "wx" });
    } catch (error) {
      if (errorCode(error) === "EEXIST") {
        throw new AppError(
          "filesystem",
          `file ${path} already exists (use --force to overwrite)`,
          { suggestion: "Use --force to overwrite existing files" },
        );
      }
      throw filesystemError(`failed to write file ${path}`, error);
    }

    this.files.push(path);
    return path;
  }

  getFiles(): string[] {
    return [...this.files];
  }

  count(): number {
    return this.files.length;
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  exists(filename: string): Promise<boolean> {
    return fileExists(join(this.outputDir, filename), "file");
  }

  async getTotalSize(): Promise<number> {
    let total = 0;
    for (const path of this.files) {
      try {
        total += (await stat(path)).size;
      } catch (error) {
        throw filesystemError(`failed to stat file ${path}`, error);
      }
    }
    return total;
  }

  /**
   * Delete every written file. The tracked list is reset even when some
   * deletions fail.
   */
  async cleanup(): Promise<void> {
    const errors: string[] = [];
    for (const path of this.files) {
      try {
        await unlink(path);
      } catch (error) {
        errors.push(`failed to remove ${path}: ${errorMessage(error)}`);
      }
    }
    this.files = [];

    if (errors.length > 0) {
      throw filesystemError(`cleanup failed with ${errors.length} errors: ${errors[0]}`);
    }
  }
}
