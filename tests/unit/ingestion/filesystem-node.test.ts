/**
 * Unit tests for filesystem nodes
 *
 * Tests construction, display ordering, lazy content and cache release.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  clearContentCache,
  contentNodes,
  createDirectoryNode,
  createFileNode,
  createSymlinkNode,
  isContentNode,
  resolveContent,
  sortChildren,
  symlinkTargetName,
  type NodeLocation,
} from "../../../src/ingestion/filesystem-node.js";
import { InvalidNodeStateError } from "../../../src/ingestion/errors.js";
import { NOTEBOOK_HEADER } from "../../../src/ingestion/notebook.js";
import { createTempDir, removeTempDir, writeFiles } from "../../fixtures/repository-fixtures.js";

function at(name: string, base: string = "/tmp/repo"): NodeLocation {
  return { name, relativePath: name, absolutePath: join(base, name), depth: 1 };
}

describe("node construction", () => {
  test("should create an empty directory node", () => {
    const node = createDirectoryNode({ name: "repo", relativePath: "", absolutePath: "/tmp/repo", depth: 0 });

    expect(node).toEqual({
      name: "repo",
      relativePath: "",
      absolutePath: "/tmp/repo",
      depth: 0,
      kind: "directory",
      size: 0,
      fileCount: 0,
      dirCount: 0,
      children: [],
    });
  });

  test("should count a file once with its size", () => {
    const node = createFileNode(at("a.txt"), 42);

    expect(node.kind).toBe("file");
    expect(node.size).toBe(42);
    expect(node.fileCount).toBe(1);
    expect(node.cachedContent).toBeNull();
  });

  test("should count a symlink as a file without size", () => {
    const node = createSymlinkNode(at("link"), "../shared/target.txt");

    expect(node.size).toBe(0);
    expect(node.fileCount).toBe(1);
    expect(symlinkTargetName(node)).toBe("target.txt");
  });

  test("should identify content nodes", () => {
    expect(isContentNode(createFileNode(at("a"), 1))).toBe(true);
    expect(isContentNode(createSymlinkNode(at("l"), "a"))).toBe(true);
    expect(isContentNode(createDirectoryNode(at("d")))).toBe(false);
  });
});

describe("sortChildren", () => {
  test("should order README, files, hidden files, directories, hidden directories", () => {
    const parent = createDirectoryNode(at("repo"));
    parent.children.push(
      createDirectoryNode(at(".github")),
      createDirectoryNode(at("src")),
      createFileNode(at(".hidden"), 1),
      createSymlinkNode(at("link"), "b.txt"),
      createFileNode(at("b.txt"), 1),
      createDirectoryNode(at("lib")),
      createFileNode(at("a.py"), 1),
      createFileNode(at("README.md"), 1)
    );

    sortChildren(parent);

    expect(parent.children.map((child) => child.name)).toEqual([
      "README.md",
      "a.py",
      "b.txt",
      ".hidden",
      "lib",
      "link",
      "src",
      ".github",
    ]);
  });

  test("should only treat readme and readme.* files as README", () => {
    const parent = createDirectoryNode(at("repo"));
    parent.children.push(
      createFileNode(at("readme_old.txt"), 1),
      createFileNode(at("a.txt"), 1),
      createSymlinkNode(at("readme.md"), "a.txt"),
      createFileNode(at("README"), 1),
      createFileNode(at("Readme.rst"), 1),
      createDirectoryNode(at("readme.d"))
    );

    sortChildren(parent);

    expect(parent.children.map((child) => child.name)).toEqual([
      "README",
      "Readme.rst",
      "a.txt",
      "readme_old.txt",
      "readme.d",
      "readme.md",
    ]);
  });

  test("should compare names case-insensitively", () => {
    const parent = createDirectoryNode(at("repo"));
    parent.children.push(createFileNode(at("Zeta.txt"), 1), createFileNode(at("alpha.txt"), 1));

    sortChildren(parent);

    expect(parent.children.map((child) => child.name)).toEqual(["alpha.txt", "Zeta.txt"]);
  });
});

describe("content", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test("should read file content once and cache it", async () => {
    await writeFiles(dir, { "a.txt": "first" });
    const node = createFileNode(at("a.txt", dir), 5);

    expect(await resolveContent(node)).toBe("first");

    await writeFiles(dir, { "a.txt": "second" });
    expect(await resolveContent(node)).toBe("first");

    clearContentCache(node);
    expect(await resolveContent(node)).toBe("second");
  });

  test("should resolve symlinks to empty content", async () => {
    const node = createSymlinkNode(at("link", dir), "a.txt");

    expect(await resolveContent(node)).toBe("");
  });

  test("should reject directory nodes", async () => {
    await expect(resolveContent(createDirectoryNode(at("d", dir)))).rejects.toBeInstanceOf(
      InvalidNodeStateError
    );
  });

  test("should convert notebooks", async () => {
    await writeFiles(dir, {
      "n.ipynb": JSON.stringify({ cells: [{ cell_type: "code", source: "x = 1" }] }),
    });

    expect(await resolveContent(createFileNode(at("n.ipynb", dir), 10))).toBe(
      `${NOTEBOOK_HEADER}\n\nx = 1\n`
    );
  });

  test("should describe notebook failures in the content", async () => {
    await writeFiles(dir, { "n.ipynb": "{}" });

    expect(await resolveContent(createFileNode(at("n.ipynb", dir), 2))).toBe(
      "Error processing notebook: Notebook has no cells"
    );
  });

  test("should clear caches below a directory", () => {
    const root = createDirectoryNode(at("repo"));
    const sub = createDirectoryNode(at("sub"));
    const a = createFileNode(at("a"), 1);
    const b = createFileNode(at("b"), 1);
    a.cachedContent = "a";
    b.cachedContent = "b";
    sub.children.push(b);
    root.children.push(a, sub);

    clearContentCache(root);

    expect(a.cachedContent).toBeNull();
    expect(b.cachedContent).toBeNull();
  });
});

describe("contentNodes", () => {
  test("should yield files and symlinks depth-first in child order", () => {
    const root = createDirectoryNode(at("repo"));
    const sub = createDirectoryNode(at("sub"));
    sub.children.push(createFileNode(at("inner"), 1));
    root.children.push(createFileNode(at("first"), 1), sub, createSymlinkNode(at("last"), "x"));

    expect([...contentNodes(root)].map((node) => node.name)).toEqual(["first", "inner", "last"]);
  });

  test("should yield a lone file", () => {
    const file = createFileNode(at("only"), 1);

    expect([...contentNodes(file)]).toEqual([file]);
  });
});
