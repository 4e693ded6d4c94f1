/**
 * Query construction for local directories.
 *
 * @module ingestion/query
 */

import { randomUUID } from "node:crypto";
import { basename, resolve } from "node:path";
import { getDigestConfig } from "../config/index.js";
import type { IngestionQuery } from "./types.js";

/**
 * Optional query fields for {@link parseLocalDirPath}
 */
export interface LocalQueryOptions {
  /** Largest file to record, in bytes (default: configured defaultMaxFileSize) */
  maxFileSize?: number;
  /** Ignore set (default: empty) */
  ignorePatterns?: ReadonlySet<string>;
  /** Include set (default: null) */
  includePatterns?: ReadonlySet<string> | null;
}

/**
 * Build a query for a local directory or file.
 *
 * The slug is the directory's own name when the input is ".", otherwise the
 * input without leading and trailing slashes.
 *
 * @example
 * ```typescript
 * const query = parseLocalDirPath("projects/demo/");
 * query.slug;    // "projects/demo"
 * query.subpath; // "/"
 * ```
 */
export function parseLocalDirPath(
  pathString: string,
  options: LocalQueryOptions = {}
): IngestionQuery {
  const localPath = resolve(pathString);
  const slug = pathString === "." ? basename(localPath) : pathString.replace(/^\/+|\/+$/g, "");

  return {
    id: randomUUID(),
    localPath,
    slug,
    subpath: "/",
    type: null,
    includePatterns: options.includePatterns ?? null,
    ignorePatterns: options.ignorePatterns ?? new Set<string>(),
    maxFileSize: options.maxFileSize ?? getDigestConfig().defaultMaxFileSize,
  };
}
