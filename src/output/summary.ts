/**
 * Summary text.
 *
 * @module output/summary
 */

import type { IngestionQuery } from "../ingestion/types.js";

const DEFAULT_BRANCHES = new Set(["main", "master"]);

/**
 * Lines naming the source of a digest.
 *
 * - `Repository: <user>/<repo>` for remote repositories, `Directory: <slug>` otherwise
 * - `Commit: <sha>`, else `Tag: <tag>`, else `Branch: <branch>` unless the branch is main or master
 * - `Subpath: <subpath>` for directory digests below the root
 *
 * @returns The lines, each ending with a newline
 */
export function createSummaryPrefix(query: IngestionQuery, singleFile: boolean = false): string {
  const parts: string[] = [];

  if (query.userName) {
    parts.push(`Repository: ${query.userName}/${query.repoName ?? ""}`);
  } else {
    parts.push(`Directory: ${query.slug}`);
  }

  if (query.commit) {
    parts.push(`Commit: ${query.commit}`);
  } else if (query.tag) {
    parts.push(`Tag: ${query.tag}`);
  } else if (query.branch && !DEFAULT_BRANCHES.has(query.branch)) {
    parts.push(`Branch: ${query.branch}`);
  }

  if (query.subpath !== "/" && !singleFile) {
    parts.push(`Subpath: ${query.subpath}`);
  }

  return `${parts.join("\n")}\n`;
}

/**
 * Number of lines in a text. A trailing line break does not start a new line.
 */
export function countLines(text: string): number {
  if (text === "") {
    return 0;
  }
  const lines = text.split(/\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.length;
}

/**
 * Integer with comma thousands separators.
 */
export function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}
