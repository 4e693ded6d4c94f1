/**
 * Bounded depth-first directory traversal.
 *
 * Builds the node tree below a root directory while enforcing global limits
 * on depth, file count and total size.
 *
 * @module ingestion/directory-traverser
 */

import type { Stats } from "node:fs";
import { lstat, readdir, readlink } from "node:fs/promises";
import { join } from "node:path";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import {
  clearContentCache,
  createDirectoryNode,
  createFileNode,
  createSymlinkNode,
  sortChildren,
  type NodeLocation,
} from "./filesystem-node.js";
import { shouldExclude, shouldInclude, toRelativePosix } from "./pattern-matcher.js";
import type {
  DirectoryNode,
  IngestionQuery,
  TraversalLimits,
  TraversalStats,
} from "./types.js";

/**
 * Number of files between two cache evictions
 */
export const EVICTION_INTERVAL = 100;

/**
 * Most recently added siblings kept cached on eviction
 */
export const EVICTION_KEEP_RECENT = 10;

/**
 * Share of the total size limit a single file may take
 */
export const SINGLE_FILE_SHARE = 0.1;

/**
 * Create zeroed statistics for a new traversal.
 */
export function createTraversalStats(): TraversalStats {
  return {
    totalFiles: 0,
    totalSize: 0,
    skipped: {
      bySize: 0,
      byTotalSize: 0,
      byFileCount: 0,
      byMemoryCap: 0,
      byDepth: 0,
      unknownType: 0,
      unreadable: 0,
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Walks a directory and fills in its node subtree.
 *
 * Entries are visited in name order, one filesystem call at a time. Nothing
 * is thrown for entries that cannot be recorded: they are counted in the
 * stats and logged.
 *
 * @example
 * ```typescript
 * const traverser = new DirectoryTraverser(getDigestConfig().limits);
 * const root = createDirectoryNode({ name: "repo", relativePath: "", absolutePath: "/tmp/repo", depth: 0 });
 * const stats = createTraversalStats();
 * await traverser.traverse(root, query, stats);
 * console.log(root.fileCount, stats.skipped.bySize);
 * ```
 */
export class DirectoryTraverser {
  private readonly limits: TraversalLimits;
  private readonly logger: pino.Logger;

  constructor(limits: TraversalLimits, logger?: pino.Logger) {
    this.limits = limits;
    this.logger = logger ?? getComponentLogger("ingestion:traversal");
  }

  /**
   * Expand `node` and, recursively, its subdirectories.
   *
   * @param node - Directory node to fill; its children are appended in place
   * @param query - Query providing the root, patterns and per-file size cap
   * @param stats - Running totals shared by the whole walk
   */
  async traverse(
    node: DirectoryNode,
    query: IngestionQuery,
    stats: TraversalStats
  ): Promise<void> {
    if (this.limitReached(node, stats)) {
      stats.skipped.byDepth++;
      return;
    }

    let names: string[];
    try {
      names = await readdir(node.absolutePath);
    } catch (error) {
      stats.skipped.unreadable++;
      this.logger.warn(
        { path: node.relativePath, error: errorMessage(error) },
        "Could not list directory, leaving it empty"
      );
      return;
    }
    names.sort();

    const includePatterns =
      query.includePatterns && query.includePatterns.size > 0 ? query.includePatterns : null;

    for (const name of names) {
      const absolutePath = join(node.absolutePath, name);

      let entry: Stats;
      try {
        entry = await lstat(absolutePath);
      } catch (error) {
        stats.skipped.unreadable++;
        this.logger.warn({ path: absolutePath, error: errorMessage(error) }, "Could not inspect entry");
        continue;
      }

      const isDirectory = entry.isDirectory();
      if (shouldExclude(absolutePath, query.localPath, query.ignorePatterns, isDirectory)) {
        continue;
      }
      if (
        includePatterns !== null &&
        !shouldInclude(absolutePath, query.localPath, includePatterns, isDirectory)
      ) {
        continue;
      }

      const location: NodeLocation = {
        name,
        relativePath: toRelativePosix(absolutePath, query.localPath) ?? name,
        absolutePath,
        depth: node.depth + 1,
      };

      if (entry.isSymbolicLink()) {
        await this.addSymlink(node, location, stats);
      } else if (entry.isFile()) {
        this.addFile(node, location, entry.size, query, stats);
      } else if (isDirectory) {
        const child = createDirectoryNode(location);
        await this.traverse(child, query, stats);

        if (child.children.length === 0) {
          continue;
        }

        node.children.push(child);
        node.size += child.size;
        node.fileCount += child.fileCount;
        node.dirCount += 1 + child.dirCount;
      } else {
        stats.skipped.unknownType++;
        this.logger.warn({ path: location.relativePath }, "Unknown file type, skipping");
      }
    }

    sortChildren(node);
  }

  /**
   * Check the limits that stop a directory from being expanded.
   */
  private limitReached(node: DirectoryNode, stats: TraversalStats): boolean {
    const { maxDirectoryDepth, maxFiles, maxTotalSizeBytes } = this.limits;

    if (node.depth > maxDirectoryDepth) {
      this.logger.warn({ path: node.relativePath, maxDirectoryDepth }, "Maximum depth limit reached");
      return true;
    }
    if (stats.totalFiles >= maxFiles) {
      this.logger.warn({ path: node.relativePath, maxFiles }, "Maximum file limit reached");
      return true;
    }
    if (stats.totalSize >= maxTotalSizeBytes) {
      this.logger.warn(
        { path: node.relativePath, maxTotalSizeBytes },
        "Maximum total size limit reached"
      );
      return true;
    }
    return false;
  }

  private async addSymlink(
    parent: DirectoryNode,
    location: NodeLocation,
    stats: TraversalStats
  ): Promise<void> {
    let target: string;
    try {
      target = await readlink(location.absolutePath);
    } catch (error) {
      stats.skipped.unreadable++;
      this.logger.warn(
        { path: location.relativePath, error: errorMessage(error) },
        "Could not read symlink"
      );
      return;
    }

    parent.children.push(createSymlinkNode(location, target));
    parent.fileCount += 1;
    stats.totalFiles += 1;
  }

  private addFile(
    parent: DirectoryNode,
    location: NodeLocation,
    size: number,
    query: IngestionQuery,
    stats: TraversalStats
  ): void {
    const { maxFiles, maxTotalSizeBytes } = this.limits;
    const path = location.relativePath;

    if (size > query.maxFileSize) {
      stats.skipped.bySize++;
      this.logger.debug({ path, size, maxFileSize: query.maxFileSize }, "Skipping file over max file size");
      return;
    }
    if (stats.totalFiles + 1 > maxFiles) {
      stats.skipped.byFileCount++;
      this.logger.debug({ path, maxFiles }, "Skipping file, maximum file limit reached");
      return;
    }
    if (stats.totalSize + size > maxTotalSizeBytes) {
      stats.skipped.byTotalSize++;
      this.logger.debug({ path, size }, "Skipping file, would exceed total size limit");
      return;
    }
    if (size > maxTotalSizeBytes * SINGLE_FILE_SHARE) {
      stats.skipped.byMemoryCap++;
      this.logger.debug({ path, size }, "Skipping file too large for a single share of the size limit");
      return;
    }

    stats.totalFiles += 1;
    stats.totalSize += size;

    parent.children.push(createFileNode(location, size));
    parent.size += size;
    parent.fileCount += 1;

    if (stats.totalFiles % EVICTION_INTERVAL === 0) {
      this.evict(parent);
    }
  }

  /**
   * Clear cached content of all but the most recently added file children.
   */
  private evict(parent: DirectoryNode): void {
    const older = parent.children.slice(0, -EVICTION_KEEP_RECENT);
    for (const sibling of older) {
      if (sibling.kind === "file") {
        clearContentCache(sibling);
      }
    }
    this.logger.trace({ path: parent.relativePath, evicted: older.length }, "Evicted cached content");
  }
}
