/**
 * Filesystem node construction, ordering and lazy content.
 *
 * Nodes are plain objects tagged by `kind`. Content of files and symlinks is
 * resolved on first read and cached on the node until cleared.
 *
 * @module ingestion/filesystem-node
 */

import { basename, extname } from "node:path";
import { InvalidNodeStateError, NotebookConversionError } from "./errors.js";
import { readTextContent } from "./file-content.js";
import { processNotebook } from "./notebook.js";
import type {
  ContentNode,
  DirectoryNode,
  FileNode,
  FilesystemNode,
  SymlinkNode,
} from "./types.js";

/**
 * Location of a node within the tree.
 */
export interface NodeLocation {
  name: string;
  relativePath: string;
  absolutePath: string;
  depth: number;
}

/**
 * Create an empty directory node.
 */
export function createDirectoryNode(location: NodeLocation): DirectoryNode {
  return {
    ...location,
    kind: "directory",
    size: 0,
    fileCount: 0,
    dirCount: 0,
    children: [],
  };
}

/**
 * Create a file node. Content is read later.
 */
export function createFileNode(location: NodeLocation, size: number): FileNode {
  return {
    ...location,
    kind: "file",
    size,
    fileCount: 1,
    dirCount: 0,
    cachedContent: null,
  };
}

/**
 * Create a symlink node. The link is recorded but never followed.
 */
export function createSymlinkNode(location: NodeLocation, target: string): SymlinkNode {
  return {
    ...location,
    kind: "symlink",
    size: 0,
    fileCount: 1,
    dirCount: 0,
    target,
    cachedContent: null,
  };
}

/**
 * Check whether a node carries content.
 */
export function isContentNode(node: FilesystemNode): node is ContentNode {
  return node.kind === "file" || node.kind === "symlink";
}

/**
 * Ordering group of a child within its directory.
 *
 * 0 README, 1 file, 2 hidden file, 3 directory, 4 hidden directory.
 * Symlinks sort with directories.
 */
function sortGroup(node: FilesystemNode): number {
  const name = node.name.toLowerCase();
  const hidden = name.startsWith(".");

  if (node.kind !== "file") {
    return hidden ? 4 : 3;
  }
  if (name === "readme" || name.startsWith("readme.")) {
    return 0;
  }
  return hidden ? 2 : 1;
}

/**
 * Order a directory's children in place for display.
 */
export function sortChildren(node: DirectoryNode): void {
  node.children.sort((a, b) => {
    const group = sortGroup(a) - sortGroup(b);
    if (group !== 0) {
      return group;
    }
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/**
 * Base name of a symlink's target, as shown in headers and trees.
 */
export function symlinkTargetName(node: SymlinkNode): string {
  return basename(node.target);
}

async function readNodeContent(node: ContentNode): Promise<string> {
  if (node.kind === "symlink") {
    return "";
  }

  if (extname(node.name) === ".ipynb") {
    try {
      return await processNotebook(node.absolutePath);
    } catch (error) {
      if (error instanceof NotebookConversionError) {
        return `Error processing notebook: ${error.message}`;
      }
      throw error;
    }
  }

  return readTextContent(node.absolutePath, node.size);
}

/**
 * Resolve the content of a node, reading it on first use.
 *
 * @throws {InvalidNodeStateError} For directory nodes
 */
export async function resolveContent(node: FilesystemNode): Promise<string> {
  if (node.kind === "directory") {
    throw new InvalidNodeStateError("Cannot read content of a directory node");
  }

  if (node.cachedContent === null) {
    node.cachedContent = await readNodeContent(node);
  }
  return node.cachedContent;
}

/**
 * Drop cached content of a node and, for directories, of every descendant.
 */
export function clearContentCache(node: FilesystemNode): void {
  switch (node.kind) {
    case "file":
    case "symlink":
      node.cachedContent = null;
      return;
    case "directory":
      for (const child of node.children) {
        clearContentCache(child);
      }
      return;
  }
}

/**
 * Yield the content nodes of a tree in depth-first display order.
 */
export function* contentNodes(node: FilesystemNode): Generator<ContentNode> {
  if (node.kind === "directory") {
    for (const child of node.children) {
      yield* contentNodes(child);
    }
    return;
  }
  yield node;
}
