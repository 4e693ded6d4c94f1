/**
 * Path filtering against gitignore-style pattern sets.
 *
 * @module ingestion/pattern-matcher
 */

import { isAbsolute, relative, sep } from "node:path";
import ignore from "ignore";

type Matcher = ReturnType<typeof ignore>;

/**
 * Compiled matchers, keyed by the pattern set they were built from.
 * Pattern sets are not modified once handed to a traversal.
 */
const matcherCache = new WeakMap<ReadonlySet<string>, Matcher>();

function compile(patterns: ReadonlySet<string>): Matcher {
  let matcher = matcherCache.get(patterns);
  if (matcher === undefined) {
    matcher = ignore().add([...patterns]);
    matcherCache.set(patterns, matcher);
  }
  return matcher;
}

/**
 * Path of `path` relative to `root` with POSIX separators.
 *
 * @returns The relative path, or null for the root itself and for paths outside it
 */
export function toRelativePosix(path: string, root: string): string | null {
  const rel = relative(root, path);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return sep === "/" ? rel : rel.split(sep).join("/");
}

function matches(
  path: string,
  root: string,
  patterns: ReadonlySet<string>,
  isDirectory: boolean
): boolean {
  if (patterns.size === 0) {
    return false;
  }
  const rel = toRelativePosix(path, root);
  if (rel === null) {
    return false;
  }
  const candidate = isDirectory ? `${rel}/` : rel;
  // Names made only of dots (e.g. "...") are rejected by ignore; nothing matches them.
  if (!ignore.isPathValid(candidate)) {
    return false;
  }
  return compile(patterns).ignores(candidate);
}

/**
 * Check whether a path matches any ignore pattern.
 *
 * @param path - Absolute path of the entry
 * @param root - Root the patterns are relative to
 * @param ignorePatterns - Gitignore-style patterns
 * @param isDirectory - Whether the entry is a directory (enables `dir/` patterns)
 */
export function shouldExclude(
  path: string,
  root: string,
  ignorePatterns: ReadonlySet<string>,
  isDirectory: boolean = false
): boolean {
  return matches(path, root, ignorePatterns, isDirectory);
}

/**
 * Check whether a path is allowed by a non-empty include set.
 *
 * Directories are always allowed; whether they survive depends on the files
 * found below them.
 */
export function shouldInclude(
  path: string,
  root: string,
  includePatterns: ReadonlySet<string>,
  isDirectory: boolean = false
): boolean {
  if (isDirectory) {
    return true;
  }
  return matches(path, root, includePatterns, false);
}
