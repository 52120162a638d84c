import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, unlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { DiskStorage } from "./disk";
import { isAppError } from "../utils/errors";

const PNG_URL = "https://example.com/shot.png";

describe("DiskStorage", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "issue-images-disk-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  // ==========================================================================
  // create
  // ==========================================================================

  describe("create", () => {
    it("creates nested output directories", async () => {
      const storage = await DiskStorage.create(join(root, "a", "b"), false);

      expect(storage.getOutputDir()).toBe(join(root, "a", "b"));
      expect(await readdir(join(root, "a"))).toEqual(["b"]);
    });

    it("normalises the directory", async () => {
      const storage = await DiskStorage.create(`${root}/x/./y/`, false);
      expect(storage.getOutputDir()).toBe(`${join(root, "x", "y")}/`);
    });

    it("rejects an empty directory", async () => {
      await expect(DiskStorage.create("", false)).rejects.toThrow(
        "output directory cannot be empty",
      );
    });

    it("reports a directory that cannot be created", async () => {
      const blocker = join(root, "file");
      await writeFile(blocker, "x");

      const error = await DiskStorage.create(join(blocker, "sub"), false).catch(
        (e: unknown) => e,
      );

      expect(isAppError(error, "filesystem")).toBe(true);
      expect(error instanceof Error && error.message).toContain(
        `failed to create output directory ${join(blocker, "sub")}`,
      );
    });
  });

  // ==========================================================================
  // store
  // ==========================================================================

  describe("store", () => {
    it("writes sequentially numbered files", async () => {
      const storage = await DiskStorage.create(root, false);

      const first = await storage.store(Buffer.from("one"), "image/png", PNG_URL);
      const second = await storage.store(
        Buffer.from("two"),
        "application/octet-stream",
        "https://example.com/pic.GIF?x=1",
      );
      const third = await storage.store(Buffer.from("three"), "", "https://example.com/blob");

      expect([first, second, third]).toEqual([
        join(root, "img-01.png"),
        join(root, "img-02.gif"),
        join(root, "img-03.bin"),
      ]);
      expect(await readFile(first, "utf-8")).toBe("one");
      expect(storage.count()).toBe(3);
      expect(storage.getFiles()).toEqual([first, second, third]);
    });

    it("rejects empty data without writing", async () => {
      const storage = await DiskStorage.create(root, false);

      await expect(storage.store(Buffer.alloc(0), "image/png", PNG_URL)).rejects.toThrow(
        "cannot store empty data",
      );
      expect(await readdir(root)).toEqual([]);
    });

    it("refuses to overwrite without force", async () => {
      await writeFile(join(root, "img-01.png"), "existing");
      const storage = await DiskStorage.create(root, false);

      await expect(storage.store(Buffer.from("new"), "image/png", PNG_URL)).rejects.toThrow(
        `file ${join(root, "img-01.png")} already exists (use --force to overwrite)`,
      );
      expect(await readFile(join(root, "img-01.png"), "utf-8")).toBe("existing");
      expect(storage.count()).toBe(0);
    });

    it("overwrites with force", async () => {
      await writeFile(join(root, "img-01.png"), "existing");
      const storage = await DiskStorage.create(root, true);

      await storage.store(Buffer.from("new"), "image/png", PNG_URL);

      expect(await readFile(join(root, "img-01.png"), "utf-8")).toBe("new");
    });

    it("collides when two stores run at once", async () => {
      const storage = await DiskStorage.create(root, false);
      const target = join(root, "img-01.png");

      const outcomes = await Promise.allSettled([
        storage.store(Buffer.from("one"), "image/png", PNG_URL),
        storage.store(Buffer.from("two"), "image/png", PNG_URL),
      ]);

      const stored = outcomes.flatMap((o) => (o.status === "fulfilled" ? [o.value] : []));
      const failures = outcomes.flatMap((o) =>
        o.status === "rejected" && o.reason instanceof Error ? [o.reason.message] : [],
      );
      expect(stored).toEqual([target]);
      expect(failures).toEqual([
        `file ${target} already exists (use --force to overwrite)`,
      ]);
      expect(storage.count()).toBe(1);
      expect(await readdir(root)).toEqual(["img-01.png"]);
    });
  });

  // ==========================================================================
  // accessors
  // ==========================================================================

  describe("accessors", () => {
    it("reports existence of files in the output directory", async () => {
      const storage = await DiskStorage.create(root, false);
      await storage.store(Buffer.from("x"), "image/png", PNG_URL);

      expect(await storage.exists("img-01.png")).toBe(true);
      expect(await storage.exists("img-02.png")).toBe(false);
    });

    it("sums the current sizes of written files", async () => {
      const storage = await DiskStorage.create(root, false);
      const path = await storage.store(Buffer.from("abc"), "image/png", PNG_URL);
      await storage.store(Buffer.from("defgh"), "image/png", PNG_URL);

      expect(await storage.getTotalSize()).toBe(8);

      await writeFile(path, "a");
      expect(await storage.getTotalSize()).toBe(6);
    });

    it("fails the size when a file has gone", async () => {
      const storage = await DiskStorage.create(root, false);
      const path = await storage.store(Buffer.from("abc"), "image/png", PNG_URL);
      await unlink(path);

      await expect(storage.getTotalSize()).rejects.toThrow(`failed to stat file ${path}`);
    });

    it("returns a copy of the file list", async () => {
      const storage = await DiskStorage.create(root, false);
      await storage.store(Buffer.from("x"), "image/png", PNG_URL);

      storage.getFiles().push("tampered");
      expect(storage.getFiles()).toHaveLength(1);
    });
  });

  // ==========================================================================
  // cleanup
  // ==========================================================================

  describe("cleanup", () => {
    it("removes written files and resets the count", async () => {
      const storage = await DiskStorage.create(root, false);
      await storage.store(Buffer.from("x"), "image/png", PNG_URL);
      await storage.store(Buffer.from("y"), "image/png", PNG_URL);

      await storage.cleanup();

      expect(await readdir(root)).toEqual([]);
      expect(storage.count()).toBe(0);
    });

    it("keeps going past failures and reports the first", async () => {
      const storage = await DiskStorage.create(root, false);
      const first = await storage.store(Buffer.from("x"), "image/png", PNG_URL);
      await storage.store(Buffer.from("y"), "image/png", PNG_URL);
      await unlink(first);

      await expect(storage.cleanup()).rejects.toThrow(
        `cleanup failed with 1 errors: failed to remove ${first}: ENOENT`,
      );
      expect(await readdir(root)).toEqual([]);
      expect(storage.count()).toBe(0);
    });

    it("restarts numbering after cleanup", async () => {
      const storage = await DiskStorage.create(root, false);
      await storage.store(Buffer.from("x"), "image/png", PNG_URL);
      await storage.cleanup();

      expect(await storage.store(Buffer.from("y"), "image/png", PNG_URL)).toBe(
        join(root, "img-01.png"),
      );
    });
  });
});
