/**
 * Unit tests for DirectoryTraverser
 *
 * Walks real temporary directories and checks the resulting node tree and
 * limit counters.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { symlink } from "node:fs/promises";
import { join } from "node:path";
import {
  DirectoryTraverser,
  createTraversalStats,
} from "../../../src/ingestion/directory-traverser.js";
import { createDirectoryNode } from "../../../src/ingestion/filesystem-node.js";
import type {
  DirectoryNode,
  FilesystemNode,
  IngestionQuery,
  TraversalLimits,
  TraversalStats,
} from "../../../src/ingestion/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  createSampleRepo,
  createTempDir,
  createTestQuery,
  removeTempDir,
  writeFiles,
} from "../../fixtures/repository-fixtures.js";
import { createLogCapture, type LogCapture } from "../../helpers/log-capture.js";

const unlistable = vi.hoisted(() => new Set<string>());

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: async (path: string) => {
      if (unlistable.has(path)) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${path}'`), {
          code: "EACCES",
        });
      }
      return actual.readdir(path);
    },
  };
});

const LIMITS: TraversalLimits = {
  maxDirectoryDepth: 20,
  maxFiles: 10_000,
  maxTotalSizeBytes: 500 * 1024 * 1024,
};

function names(node: FilesystemNode): string[] {
  return node.kind === "directory" ? node.children.map((child) => child.name) : [];
}

function child(node: DirectoryNode, name: string): FilesystemNode | undefined {
  return node.children.find((entry) => entry.name === name);
}

describe("DirectoryTraverser", () => {
  let base: string;
  let repo: string;
  let capture: LogCapture;

  beforeEach(async () => {
    capture = createLogCapture();
    initializeLogger({ level: "trace", format: "json", stream: capture.stream });
    base = await createTempDir();
  });

  afterEach(async () => {
    unlistable.clear();
    resetLogger();
    await removeTempDir(base);
  });

  async function walk(
    query: IngestionQuery,
    limits: TraversalLimits = LIMITS
  ): Promise<{ root: DirectoryNode; stats: TraversalStats }> {
    const root = createDirectoryNode({
      name: "test_repo",
      relativePath: "",
      absolutePath: query.localPath,
      depth: 0,
    });
    const stats = createTraversalStats();
    await new DirectoryTraverser(limits).traverse(root, query, stats);
    return { root, stats };
  }

  describe("full walk", () => {
    beforeEach(async () => {
      repo = await createSampleRepo(base);
    });

    test("should record every file with aggregates", async () => {
      const { root, stats } = await walk(createTestQuery(repo));

      expect(root.fileCount).toBe(8);
      expect(root.dirCount).toBe(4);
      expect(root.size).toBe(135);
      expect(stats.totalFiles).toBe(8);
      expect(stats.totalSize).toBe(135);
    });

    test("should order children for display", async () => {
      const { root } = await walk(createTestQuery(repo));

      expect(names(root)).toEqual(["file1.txt", "file2.py", "dir1", "dir2", "src"]);

      const src = child(root, "src");
      expect(src && names(src)).toEqual(["subfile1.txt", "subfile2.py", "subdir"]);
    });

    test("should record relative paths and depths", async () => {
      const { root } = await walk(createTestQuery(repo));

      const src = child(root, "src");
      const subdir = src?.kind === "directory" ? child(src, "subdir") : undefined;
      const file = subdir?.kind === "directory" ? child(subdir, "file_subdir.py") : undefined;

      expect(file?.relativePath).toBe("src/subdir/file_subdir.py");
      expect(file?.depth).toBe(3);
      expect(subdir?.size).toBe(43);
      expect(subdir?.fileCount).toBe(2);
    });

    test("should skip excluded entries and drop empty directories", async () => {
      const { root } = await walk(createTestQuery(repo, { ignorePatterns: new Set(["src", "dir1/*.txt"]) }));

      expect(names(root)).toEqual(["file1.txt", "file2.py", "dir2"]);
      expect(root.fileCount).toBe(3);
    });

    test("should record only included files", async () => {
      const { root } = await walk(createTestQuery(repo, { includePatterns: new Set(["*.py"]) }));

      expect(root.fileCount).toBe(3);
      expect(root.dirCount).toBe(2);
      expect(names(root)).toEqual(["file2.py", "src"]);
    });

    test("should skip files over the query's max file size", async () => {
      const { root, stats } = await walk(createTestQuery(repo, { maxFileSize: 12 }));

      expect(names(root)).toEqual(["file1.txt"]);
      expect(stats.skipped.bySize).toBe(7);
    });

    test("should stop at the file limit", async () => {
      const { root, stats } = await walk(createTestQuery(repo), { ...LIMITS, maxFiles: 3 });

      expect(names(root)).toEqual(["file1.txt", "dir1", "dir2"]);
      expect(root.fileCount).toBe(3);
      expect(stats.skipped.byFileCount).toBe(1);
      expect(stats.skipped.byDepth).toBe(1);
    });

    test("should not expand directories below the depth limit", async () => {
      const { root, stats } = await walk(createTestQuery(repo), {
        ...LIMITS,
        maxDirectoryDepth: 1,
      });

      expect(root.fileCount).toBe(6);
      expect(stats.skipped.byDepth).toBe(1);
      const src = child(root, "src");
      expect(src && names(src)).toEqual(["subfile1.txt", "subfile2.py"]);
      expect(capture.find((log) => log.msg === "Maximum depth limit reached")).toBeDefined();
    });

    test("should record symlinks without following them", async () => {
      await symlink("file1.txt", join(repo, "link.txt"));

      const { root } = await walk(createTestQuery(repo));

      const link = child(root, "link.txt");
      expect(link?.kind).toBe("symlink");
      expect(link?.kind === "symlink" ? link.target : null).toBe("file1.txt");
      expect(root.fileCount).toBe(9);
      expect(root.size).toBe(135);
      expect(names(root)).toEqual(["file1.txt", "file2.py", "dir1", "dir2", "link.txt", "src"]);
    });

    test("should leave unreadable directories out", async () => {
      unlistable.add(join(repo, "dir1"));

      const { root, stats } = await walk(createTestQuery(repo));

      expect(stats.skipped.unreadable).toBe(1);
      expect(root.fileCount).toBe(7);
      expect(child(root, "dir1")).toBeUndefined();
      expect(capture.find((log) => log.msg === "Could not list directory, leaving it empty")).toBeDefined();
    });

    test("should walk entries whose names are only dots", async () => {
      await writeFiles(repo, { "...": "dots", "..../inner.txt": "in" });

      const { root, stats } = await walk(createTestQuery(repo));

      expect(root.fileCount).toBe(10);
      expect(stats.skipped.unreadable).toBe(0);
      expect(child(root, "...")?.kind).toBe("file");
      const dots = child(root, "....");
      expect(dots && names(dots)).toEqual(["inner.txt"]);
    });
  });

  describe("size limits", () => {
    test("should skip files that would exceed the total size", async () => {
      const files: Record<string, string> = {};
      for (let i = 0; i < 12; i++) {
        files[`f${String(i).padStart(2, "0")}.txt`] = "abcde";
      }
      await writeFiles(base, files);

      const { root, stats } = await walk(createTestQuery(base), {
        ...LIMITS,
        maxTotalSizeBytes: 50,
      });

      expect(root.fileCount).toBe(10);
      expect(root.size).toBe(50);
      expect(stats.skipped.byTotalSize).toBe(2);
    });

    test("should skip a file larger than its share of the total size", async () => {
      await writeFiles(base, { "big.txt": "x".repeat(20), "small.txt": "x".repeat(5) });

      const { root, stats } = await walk(createTestQuery(base), {
        ...LIMITS,
        maxTotalSizeBytes: 100,
      });

      expect(names(root)).toEqual(["small.txt"]);
      expect(stats.skipped.byMemoryCap).toBe(1);
    });
  });

  describe("cache eviction", () => {
    test("should evict older siblings every hundred files", async () => {
      const files: Record<string, string> = {};
      for (let i = 0; i < 100; i++) {
        files[`f${String(i).padStart(3, "0")}.txt`] = "x";
      }
      await writeFiles(base, files);

      const { root } = await walk(createTestQuery(base));

      expect(root.fileCount).toBe(100);
      const eviction = capture.find((log) => log.msg === "Evicted cached content");
      expect(eviction?.["evicted"]).toBe(90);
      expect(eviction?.component).toBe("ingestion:traversal");
    });
  });
});
