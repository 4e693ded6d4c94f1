/**
 * Content block production and assembly.
 *
 * Blocks are produced one file at a time and each file's cached content is
 * released as soon as its block exists. Assembly then joins the blocks with
 * a strategy chosen by the total size of the tree.
 *
 * @module output/content
 */

import {
  clearContentCache,
  contentNodes,
  resolveContent,
  symlinkTargetName,
} from "../ingestion/filesystem-node.js";
import type { ContentNode, FilesystemNode } from "../ingestion/types.js";
import type { AssemblyThresholds } from "./types.js";

/**
 * Line framing every block header
 */
export const SEPARATOR = "=".repeat(48);

export const DEFAULT_ASSEMBLY_THRESHOLDS: AssemblyThresholds = {
  mediumTierBytes: 10 * 1024 * 1024,
  largeTierBytes: 100 * 1024 * 1024,
  rollUpChars: 5 * 1024 * 1024,
  compactEveryFiles: 100,
};

/**
 * Assembly strategy for a tree of the given size.
 */
export type AssemblyTier = "small" | "medium" | "large";

export function selectTier(totalBytes: number, thresholds: AssemblyThresholds): AssemblyTier {
  if (totalBytes < thresholds.mediumTierBytes) {
    return "small";
  }
  if (totalBytes < thresholds.largeTierBytes) {
    return "medium";
  }
  return "large";
}

/**
 * Header path of a content node: its relative path, or its name for a root file.
 */
function headerPath(node: ContentNode): string {
  return node.relativePath === "" ? node.name : node.relativePath;
}

/**
 * Render the block of one file or symlink.
 *
 * ```
 * ================================================
 * FILE: src/main.ts
 * ================================================
 * <content>
 *
 * ```
 */
export async function renderContentBlock(node: ContentNode): Promise<string> {
  const kind = node.kind === "file" ? "FILE" : "SYMLINK";
  const target = node.kind === "symlink" ? ` -> ${symlinkTargetName(node)}` : "";
  const content = await resolveContent(node);

  return `${SEPARATOR}\n${kind}: ${headerPath(node)}${target}\n${SEPARATOR}\n${content}\n\n`;
}

/**
 * Yield the content block of every file and symlink below a node, in display order.
 *
 * Each node's cache is cleared once its block has been rendered.
 */
export async function* gatherContentBlocks(node: FilesystemNode): AsyncGenerator<string> {
  for (const contentNode of contentNodes(node)) {
    const block = await renderContentBlock(contentNode);
    clearContentCache(contentNode);
    yield block;
  }
}

function collectGarbage(): void {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") {
    gc();
  }
}

async function assembleSmall(blocks: AsyncIterable<string>): Promise<string> {
  const parts: string[] = [];
  for await (const block of blocks) {
    parts.push(block);
  }
  return parts.join("\n");
}

async function assembleMedium(
  blocks: AsyncIterable<string>,
  rollUpChars: number
): Promise<string> {
  let parts: string[] = [];
  let accumulated = 0;

  for await (const block of blocks) {
    parts.push(block);
    accumulated += block.length;

    if (accumulated >= rollUpChars) {
      const joined = parts.join("\n");
      parts = [joined];
      accumulated = joined.length;
    }
  }

  return parts.join("\n");
}

async function assembleLarge(
  blocks: AsyncIterable<string>,
  compactEveryFiles: number
): Promise<string> {
  let buffer: string[] = [];
  let index = 0;

  for await (const block of blocks) {
    if (index > 0) {
      buffer.push("\n");
    }
    buffer.push(block);
    index++;

    if (index % compactEveryFiles === 0) {
      buffer = [buffer.join("")];
      collectGarbage();
    }
  }

  return buffer.join("");
}

/**
 * Join content blocks into the final content string.
 *
 * @param blocks - Blocks in display order
 * @param totalBytes - Size of the tree the blocks come from
 * @param thresholds - Tier boundaries
 * @returns Blocks joined with a newline
 */
export async function assembleContent(
  blocks: AsyncIterable<string>,
  totalBytes: number,
  thresholds: AssemblyThresholds = DEFAULT_ASSEMBLY_THRESHOLDS
): Promise<string> {
  switch (selectTier(totalBytes, thresholds)) {
    case "small":
      return assembleSmall(blocks);
    case "medium":
      return assembleMedium(blocks, thresholds.rollUpChars);
    case "large":
      return assembleLarge(blocks, thresholds.compactEveryFiles);
  }
}
