/**
 * Ingestion entry points.
 *
 * Resolves the requested root, builds the node tree (or a single file node),
 * formats it and releases cached content.
 *
 * @module ingestion/ingest
 */

import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { z } from "zod";
import { getDigestConfig } from "../config/index.js";
import { getComponentLogger } from "../logging/index.js";
import { formatNode } from "../output/digest-formatter.js";
import type { Digest, FormatOptions } from "../output/types.js";
import { createTraversalStats, DirectoryTraverser } from "./directory-traverser.js";
import {
  EmptyContentError,
  PathNotFoundError,
  UnsupportedNodeTypeError,
  ValidationError,
} from "./errors.js";
import {
  clearContentCache,
  createDirectoryNode,
  createFileNode,
  resolveContent,
} from "./filesystem-node.js";
import { toRelativePosix } from "./pattern-matcher.js";
import { loadIgnoreFilePatterns, processPatterns } from "./patterns.js";
import { parseLocalDirPath } from "./query.js";
import type { IngestionQuery, IngestOptions, TraversalLimits } from "./types.js";

/**
 * Runtime shape of an {@link IngestionQuery}
 */
export const IngestionQuerySchema = z.object({
  id: z.string().min(1, "id is required"),
  localPath: z.string().min(1, "localPath is required"),
  slug: z.string().min(1, "slug is required"),
  subpath: z.string(),
  type: z.enum(["blob", "tree"]).nullable(),
  includePatterns: z.set(z.string()).nullable(),
  ignorePatterns: z.set(z.string()),
  maxFileSize: z.number().int().positive("maxFileSize must be positive"),
  userName: z.string().optional(),
  repoName: z.string().optional(),
  branch: z.string().optional(),
  commit: z.string().optional(),
  tag: z.string().optional(),
});

/**
 * Options for {@link ingestQuery}
 */
export interface IngestQueryOptions {
  /** Traversal limits (default: process-wide configuration) */
  limits?: TraversalLimits;
  /** Formatter options */
  format?: FormatOptions;
}

function validateQuery(query: IngestionQuery): void {
  const result = IngestionQuerySchema.safeParse(query);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join(".") : "query";
    throw new ValidationError(
      `Invalid ingestion query: ${issue?.message ?? "unknown error"}`,
      field,
      result.error
    );
  }
}

/**
 * Root path of a query: its local path joined with the subpath.
 */
export function resolveRoot(query: IngestionQuery): string {
  const subpath = query.subpath.replace(/^\/+|\/+$/g, "");
  return subpath === "" ? query.localPath : join(query.localPath, subpath);
}

async function statRoot(root: string, query: IngestionQuery): Promise<Stats> {
  try {
    return await stat(root);
  } catch (error) {
    throw new PathNotFoundError(query.slug, root, error instanceof Error ? error : undefined);
  }
}

/**
 * Ingest a query and render its digest.
 *
 * @throws {ValidationError} If the query is malformed, or a blob query does not name a file
 * @throws {PathNotFoundError} If the root does not exist
 * @throws {EmptyContentError} If a single file has no content
 * @throws {UnsupportedNodeTypeError} If the root is neither a file nor a directory
 */
export async function ingestQuery(
  query: IngestionQuery,
  options: IngestQueryOptions = {}
): Promise<Digest> {
  validateQuery(query);

  const logger = getComponentLogger("ingestion:orchestrator", query.id);
  const startTime = performance.now();
  const root = resolveRoot(query);
  const rootStats = await statRoot(root, query);

  const location = {
    name: basename(root),
    relativePath: toRelativePosix(root, query.localPath) ?? "",
    absolutePath: root,
    depth: 0,
  };

  if (query.type === "blob" || rootStats.isFile()) {
    if (!rootStats.isFile()) {
      throw new ValidationError(`Path ${root} is not a file`, "subpath");
    }

    const fileNode = createFileNode(location, rootStats.size);
    try {
      const content = await resolveContent(fileNode);
      if (content === "") {
        throw new EmptyContentError(fileNode.name);
      }

      const digest = await formatNode(fileNode, query, options.format);
      logger.info(
        { metric: "ingest.duration_ms", value: Math.round(performance.now() - startTime) },
        "Single file ingested"
      );
      return digest;
    } finally {
      clearContentCache(fileNode);
    }
  }

  if (!rootStats.isDirectory()) {
    throw new UnsupportedNodeTypeError(root);
  }

  const rootNode = createDirectoryNode(location);
  const stats = createTraversalStats();
  const traverser = new DirectoryTraverser(options.limits ?? getDigestConfig().limits);

  try {
    await traverser.traverse(rootNode, query, stats);
    logger.debug(
      { totalFiles: stats.totalFiles, totalSize: stats.totalSize, skipped: stats.skipped },
      "Traversal completed"
    );

    const digest = await formatNode(rootNode, query, options.format);

    logger.info({ metric: "ingest.files", value: rootNode.fileCount }, "Files recorded");
    logger.info(
      { metric: "ingest.duration_ms", value: Math.round(performance.now() - startTime) },
      "Directory ingested"
    );
    return digest;
  } finally {
    clearContentCache(rootNode);
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Missing roots are reported by ingestQuery
    return false;
  }
}

/**
 * Ingest a local directory or file.
 *
 * Builds the query from `source`, merges the default ignore list with the
 * given patterns and, unless `includeGitignored` is set, with the patterns of
 * every .gitignore under the root.
 *
 * @example
 * ```typescript
 * const { summary, tree, content } = await ingest("./my-project", {
 *   includePatterns: "*.ts",
 *   excludePatterns: ["tests/"],
 * });
 * ```
 */
export async function ingest(
  source: string,
  options: IngestOptions & Pick<IngestQueryOptions, "format"> = {}
): Promise<Digest> {
  const { ignorePatterns, includePatterns } = processPatterns(
    options.excludePatterns,
    options.includePatterns
  );

  const localPath = resolve(source);
  if (!options.includeGitignored && (await isDirectory(localPath))) {
    for (const pattern of await loadIgnoreFilePatterns(localPath)) {
      ignorePatterns.add(pattern);
    }
  }

  const query = parseLocalDirPath(source, {
    maxFileSize: options.maxFileSize,
    ignorePatterns,
    includePatterns,
  });

  return ingestQuery(query, { limits: options.limits, format: options.format });
}
