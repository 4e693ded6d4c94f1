/**
 * Unit tests for file content extraction
 *
 * Uses real files in a temporary directory.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  CONTENT_PLACEHOLDERS,
  decodes,
  readChunk,
  readTextContent,
} from "../../../src/ingestion/file-content.js";
import { createTempDir, removeTempDir, writeFiles } from "../../fixtures/repository-fixtures.js";

describe("file content", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("readChunk", () => {
    test("should return at most the requested bytes", async () => {
      await writeFiles(dir, { "a.txt": "abcdefgh" });

      const chunk = await readChunk(join(dir, "a.txt"), 3);

      expect(chunk).not.toBeNull();
      expect(Buffer.from(chunk ?? new Uint8Array()).toString("utf-8")).toBe("abc");
    });

    test("should return null for a missing file", async () => {
      expect(await readChunk(join(dir, "missing.txt"))).toBeNull();
    });
  });

  describe("decodes", () => {
    test("should accept valid UTF-8", () => {
      expect(decodes(Buffer.from("héllo", "utf-8"), "utf-8")).toBe(true);
    });

    test("should reject invalid UTF-8", () => {
      expect(decodes(new Uint8Array([0xff, 0xfe, 0x00, 0x80]), "utf-8")).toBe(false);
    });

    test("should accept a sequence cut at the end of the sample", () => {
      const bytes = Buffer.from("é", "utf-8").subarray(0, 1);

      expect(decodes(bytes, "utf-8")).toBe(true);
    });
  });

  describe("readTextContent", () => {
    test("should return text of a UTF-8 file", async () => {
      await writeFiles(dir, { "a.txt": "line one\nline two\n" });

      expect(await readTextContent(join(dir, "a.txt"), 18)).toBe("line one\nline two\n");
    });

    test("should return the empty placeholder for an empty file", async () => {
      await writeFiles(dir, { "empty.txt": "" });

      expect(await readTextContent(join(dir, "empty.txt"), 0)).toBe(CONTENT_PLACEHOLDERS.EMPTY);
    });

    test("should return the binary placeholder for undecodable bytes", async () => {
      await writeFiles(dir, { "blob.bin": new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0xff, 0x00]) });

      expect(await readTextContent(join(dir, "blob.bin"), 6)).toBe("[Binary file]");
    });

    test("should return the read error placeholder for a missing file", async () => {
      expect(await readTextContent(join(dir, "missing.txt"), 10)).toBe("Error reading file");
    });

    test("should keep multi-byte characters across read chunks", async () => {
      const text = "ü".repeat(600_000);
      await writeFiles(dir, { "wide.txt": text });

      const content = await readTextContent(join(dir, "wide.txt"), 1_200_000);

      expect(content.length).toBe(600_000);
      expect(content).toBe(text);
    });

    test("should truncate files above the large file threshold", async () => {
      await writeFiles(dir, { "small.txt": "abc" });

      const content = await readTextContent(join(dir, "small.txt"), 11 * 1024 * 1024);

      expect(content).toBe("abc\n\n[... File truncated (total size: 11.0 MB) ...]");
    });

    test("should keep only the preview bytes of a large file", async () => {
      await writeFiles(dir, { "big.txt": "x".repeat(200 * 1024) });

      const content = await readTextContent(join(dir, "big.txt"), 12 * 1024 * 1024);

      expect(content).toBe(
        `${"x".repeat(100 * 1024)}\n\n[... File truncated (total size: 12.0 MB) ...]`
      );
    });
  });
});
