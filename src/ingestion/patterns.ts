/**
 * Pattern processing for include and exclude filters.
 *
 * Turns raw user input into validated pattern sets, merges the default ignore
 * list, and collects patterns from ignore files under a root.
 *
 * @module ingestion/patterns
 */

import { readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { glob } from "glob";
import { z } from "zod";
import { getComponentLogger } from "../logging/index.js";
import defaultIgnoreData from "./default-ignore-patterns.json";
import { InvalidPatternError } from "./errors.js";

/**
 * Patterns ignored unless an include pattern names them explicitly
 */
export const DEFAULT_IGNORE_PATTERNS: ReadonlySet<string> = new Set(
  z.array(z.string().min(1)).parse(defaultIgnoreData)
);

/**
 * Characters allowed besides Unicode letters and digits
 */
const VALID_PATTERN = /^[\p{L}\p{N}\-_./+*@]+$/u;

/**
 * Result of {@link processPatterns}
 */
export interface ProcessedPatterns {
  ignorePatterns: Set<string>;
  includePatterns: Set<string> | null;
}

/**
 * Check a single pattern against the character allow-list.
 */
export function isValidPattern(pattern: string): boolean {
  return VALID_PATTERN.test(pattern);
}

/**
 * Split, normalize and validate raw patterns.
 *
 * Each input string may hold several patterns separated by commas or spaces.
 * Backslashes are turned into forward slashes.
 *
 * @throws {InvalidPatternError} If a pattern contains a character outside the allow-list
 *
 * @example
 * ```typescript
 * parsePatterns("*.py, *.md, docs/*"); // Set { "*.py", "*.md", "docs/*" }
 * ```
 */
export function parsePatterns(input: string | Iterable<string>): Set<string> {
  const raw = typeof input === "string" ? [input] : [...input];
  const parsed = new Set<string>();

  for (const entry of raw) {
    for (const piece of entry.split(/[, ]/)) {
      if (piece !== "") {
        parsed.add(piece.replace(/\\/g, "/"));
      }
    }
  }

  for (const pattern of parsed) {
    if (!isValidPattern(pattern)) {
      throw new InvalidPatternError(pattern);
    }
  }

  return parsed;
}

/**
 * Build the ignore and include sets for a query.
 *
 * The ignore set is the default list plus the exclude patterns. Include
 * patterns are removed from the ignore set so that naming a pattern
 * explicitly overrides a default.
 */
export function processPatterns(
  excludePatterns?: string | Iterable<string> | null,
  includePatterns?: string | Iterable<string> | null
): ProcessedPatterns {
  const ignorePatterns = new Set(DEFAULT_IGNORE_PATTERNS);

  if (excludePatterns) {
    for (const pattern of parsePatterns(excludePatterns)) {
      ignorePatterns.add(pattern);
    }
  }

  const parsedInclude = includePatterns ? parsePatterns(includePatterns) : new Set<string>();
  if (parsedInclude.size === 0) {
    return { ignorePatterns, includePatterns: null };
  }

  for (const pattern of parsedInclude) {
    ignorePatterns.delete(pattern);
  }

  return { ignorePatterns, includePatterns: parsedInclude };
}

/**
 * Scope one ignore-file line to the directory that holds the file.
 *
 * @returns The pattern relative to the root, or null for lines that carry none
 */
export function scopeIgnoreLine(line: string, directory: string): string | null {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("!")) {
    return null;
  }

  const anchored = trimmed.startsWith("/") || trimmed.slice(0, -1).includes("/");
  const pattern = trimmed.replace(/^\/+/, "");
  if (pattern === "") {
    return null;
  }

  if (directory === "" || directory === ".") {
    return pattern;
  }
  return anchored ? `${directory}/${pattern}` : `${directory}/**/${pattern}`;
}

/**
 * Collect patterns from every ignore file under a root.
 *
 * Files inside `.git` and `node_modules` are not read. Blank lines, comments
 * and negations are skipped.
 *
 * @param root - Directory to search
 * @param fileName - Ignore file name
 * @returns Patterns relative to the root
 */
export async function loadIgnoreFilePatterns(
  root: string,
  fileName: string = ".gitignore"
): Promise<Set<string>> {
  const logger = getComponentLogger("ingestion:patterns");
  const files = await glob(`**/${fileName}`, {
    cwd: root,
    dot: true,
    nodir: true,
    posix: true,
    ignore: ["**/.git/**", "**/node_modules/**"],
  });
  files.sort();

  const patterns = new Set<string>();

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(join(root, file), "utf-8");
    } catch (error) {
      logger.warn(
        { file, error: error instanceof Error ? error.message : String(error) },
        "Could not read ignore file"
      );
      continue;
    }

    const directory = posix.dirname(file);
    for (const line of text.split(/\r?\n/)) {
      const pattern = scopeIgnoreLine(line, directory);
      if (pattern !== null) {
        patterns.add(pattern);
      }
    }
  }

  logger.debug({ root, files: files.length, patterns: patterns.size }, "Loaded ignore file patterns");
  return patterns;
}
