import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readTextFile, ensureDirectory, errnoCode } from "./io.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "kvlog-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function tempFiles(dir: string): Promise<string[]> {
    const files = await readdir(dir);
    return files.filter((f) => f.endsWith(".tmp"));
  }

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "data.json");

      await atomicWrite(filePath, '{"a": 1}\n');

      expect(await readTextFile(filePath)).toBe('{"a": 1}\n');
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "data.json"), "{}");

      expect(await tempFiles(testDir)).toEqual([]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "data.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should leave one complete write under concurrent writers", async () => {
      const filePath = join(testDir, "concurrent.json");

      await Promise.all(
        Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`))
      );

      const result = await readTextFile(filePath);
      expect(result).toMatch(/^write-\d+$/);
      expect(await tempFiles(testDir)).toEqual([]);
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "nested", "deeper", "data.json");

      await atomicWrite(filePath, "{}");

      expect(await readTextFile(filePath)).toBe("{}");
    });

    it("should keep the previous file and remove the temp file when rename fails", async () => {
      // A directory at the target path makes rename() fail after the temp file is written
      const target = join(testDir, "target");
      await mkdir(target);
      await writeFile(join(target, "keep.txt"), "kept");

      await expect(atomicWrite(target, "new content")).rejects.toThrow();

      expect(await tempFiles(testDir)).toEqual([]);
      expect(await readTextFile(join(target, "keep.txt"))).toBe("kept");
    });

    it("should return null for a missing file", async () => {
      expect(await readTextFile(join(testDir, "missing.json"))).toBeNull();
    });
  });

  describe("ensureDirectory", () => {
    it("should be idempotent", async () => {
      const dir = join(testDir, "a", "b");

      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(join(testDir, "a"))).toEqual(["b"]);
    });
  });

  describe("errnoCode", () => {
    it("should read the code of a system error", () => {
      const err = Object.assign(new Error("missing"), { code: "ENOENT" });
      expect(errnoCode(err)).toBe("ENOENT");
    });

    it("should return undefined for values without a code", () => {
      expect(errnoCode(new Error("plain"))).toBeUndefined();
      expect(errnoCode("ENOENT")).toBeUndefined();
    });
  });
});
