/**
 * Repository ingestion module.
 *
 * Walks a local directory under hard limits, builds the filesystem node tree
 * and hands it to the digest formatter.
 *
 * @module ingestion
 */

export { ingest, ingestQuery, resolveRoot, IngestionQuerySchema } from "./ingest.js";
export type { IngestQueryOptions } from "./ingest.js";
export { DirectoryTraverser, createTraversalStats } from "./directory-traverser.js";
export { parseLocalDirPath } from "./query.js";
export type { LocalQueryOptions } from "./query.js";
export {
  DEFAULT_IGNORE_PATTERNS,
  parsePatterns,
  processPatterns,
  isValidPattern,
  loadIgnoreFilePatterns,
} from "./patterns.js";
export type { ProcessedPatterns } from "./patterns.js";
export { shouldExclude, shouldInclude } from "./pattern-matcher.js";
export {
  createDirectoryNode,
  createFileNode,
  createSymlinkNode,
  sortChildren,
  resolveContent,
  clearContentCache,
  contentNodes,
  isContentNode,
} from "./filesystem-node.js";
export type { NodeLocation } from "./filesystem-node.js";
export { convertNotebook, processNotebook } from "./notebook.js";
export type {
  NodeKind,
  FileNode,
  DirectoryNode,
  SymlinkNode,
  FilesystemNode,
  ContentNode,
  QueryType,
  IngestionQuery,
  IngestOptions,
  SkipCounters,
  TraversalStats,
  TraversalLimits,
} from "./types.js";
export {
  IngestionError,
  ValidationError,
  PathNotFoundError,
  EmptyContentError,
  InvalidNodeStateError,
  UnsupportedNodeTypeError,
  InvalidPatternError,
  NotebookConversionError,
  isIngestionError,
} from "./errors.js";
