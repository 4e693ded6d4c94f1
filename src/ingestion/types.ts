/**
 * Type definitions for repository ingestion.
 *
 * @module ingestion/types
 */

import type { TraversalLimits } from "../config/index.js";

export type { TraversalLimits };

/**
 * Kind of a filesystem node.
 */
export type NodeKind = "file" | "directory" | "symlink";

/**
 * Fields shared by every node kind.
 */
interface BaseNode {
  /**
   * Entry name (last path segment).
   */
  name: string;

  /**
   * Path relative to the query's local path, with POSIX separators.
   *
   * Empty for the ingestion root.
   */
  relativePath: string;

  /**
   * Absolute filesystem path.
   */
  absolutePath: string;

  /**
   * Size in bytes. Aggregated over descendants for directories, 0 for symlinks.
   */
  size: number;

  /**
   * Number of files and symlinks at or below this node.
   */
  fileCount: number;

  /**
   * Number of directories below this node.
   */
  dirCount: number;

  /**
   * Depth in the tree (root = 0).
   */
  depth: number;
}

/**
 * Regular file with lazily resolved content.
 */
export interface FileNode extends BaseNode {
  kind: "file";

  /**
   * Resolved text content, or null when not yet read or evicted.
   */
  cachedContent: string | null;
}

/**
 * Symbolic link. Never dereferenced.
 */
export interface SymlinkNode extends BaseNode {
  kind: "symlink";

  /**
   * Link target as stored in the link itself.
   */
  target: string;

  cachedContent: string | null;
}

/**
 * Directory with ordered children.
 */
export interface DirectoryNode extends BaseNode {
  kind: "directory";

  /**
   * Children in display order.
   */
  children: FilesystemNode[];
}

/**
 * Any node of the in-memory tree.
 */
export type FilesystemNode = FileNode | DirectoryNode | SymlinkNode;

/**
 * Nodes that carry content.
 */
export type ContentNode = FileNode | SymlinkNode;

/**
 * Ingestion mode requested by the caller.
 *
 * - blob: a single file
 * - tree: a directory
 */
export type QueryType = "blob" | "tree";

/**
 * Fully resolved ingestion request.
 *
 * Built by {@link parseLocalDirPath} for local directories, or by an external
 * collaborator that has already checked out a remote repository.
 */
export interface IngestionQuery {
  /**
   * Unique identifier of this request, used as the logging request ID.
   */
  id: string;

  /**
   * Absolute path of the local checkout or directory.
   */
  localPath: string;

  /**
   * Display name ("user/repo" or a directory name).
   */
  slug: string;

  /**
   * Path within localPath to ingest.
   *
   * @default "/"
   */
  subpath: string;

  /**
   * Requested mode, or null to detect from the filesystem.
   */
  type: QueryType | null;

  /**
   * Patterns a file must match to be included, or null to include everything
   * not ignored.
   */
  includePatterns: ReadonlySet<string> | null;

  /**
   * Patterns that exclude a path.
   */
  ignorePatterns: ReadonlySet<string>;

  /**
   * Largest file (in bytes) recorded during traversal.
   */
  maxFileSize: number;

  /**
   * Repository owner, for remote repositories.
   */
  userName?: string;

  /**
   * Repository name, for remote repositories.
   */
  repoName?: string;

  /**
   * Checked-out branch.
   */
  branch?: string;

  /**
   * Checked-out commit SHA.
   */
  commit?: string;

  /**
   * Checked-out tag.
   */
  tag?: string;
}

/**
 * Counters of entries left out of the tree.
 */
export interface SkipCounters {
  /** Files larger than the query's maxFileSize */
  bySize: number;
  /** Files that would push totalSize past the limit */
  byTotalSize: number;
  /** Files that would push totalFiles past the limit */
  byFileCount: number;
  /** Files larger than the per-file share of the total size limit */
  byMemoryCap: number;
  /** Directories not expanded because of depth or global limits */
  byDepth: number;
  /** Entries that are neither file, directory nor symlink */
  unknownType: number;
  /** Entries that could not be inspected, and directories that could not be listed */
  unreadable: number;
}

/**
 * Running totals of one traversal.
 *
 * Owned by a single ingestion and passed by reference through the walk.
 */
export interface TraversalStats {
  /** Files and symlinks recorded so far */
  totalFiles: number;
  /** Bytes of file content recorded so far */
  totalSize: number;
  skipped: SkipCounters;
}

/**
 * Options for the {@link ingest} convenience entry point.
 */
export interface IngestOptions {
  /**
   * Largest file to record, in bytes.
   *
   * @default config.defaultMaxFileSize (10 MB)
   */
  maxFileSize?: number;

  /**
   * Extra exclude patterns (string or list, comma or space separated).
   */
  excludePatterns?: string | Iterable<string>;

  /**
   * Include patterns. When given, only matching files are recorded.
   */
  includePatterns?: string | Iterable<string>;

  /**
   * Skip loading .gitignore files under the root.
   *
   * @default false
   */
  includeGitignored?: boolean;

  /**
   * Traversal limits. Defaults to the process-wide configuration.
   */
  limits?: TraversalLimits;
}
