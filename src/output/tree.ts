/**
 * Directory tree rendering.
 *
 * @module output/tree
 */

import { symlinkTargetName } from "../ingestion/filesystem-node.js";
import type { FilesystemNode } from "../ingestion/types.js";

export const TREE_HEADER = "Directory structure:\n";

function displayName(node: FilesystemNode, fallbackName: string): string {
  const name = node.name === "" ? fallbackName : node.name;

  switch (node.kind) {
    case "directory":
      return `${name}/`;
    case "symlink":
      return `${name} -> ${symlinkTargetName(node)}`;
    case "file":
      return name;
  }
}

function renderLines(
  node: FilesystemNode,
  prefix: string,
  isLast: boolean,
  fallbackName: string,
  lines: string[]
): void {
  lines.push(`${prefix}${isLast ? "└── " : "├── "}${displayName(node, fallbackName)}`);

  if (node.kind !== "directory") {
    return;
  }

  const childPrefix = prefix + (isLast ? "    " : "│   ");
  node.children.forEach((child, index) => {
    renderLines(child, childPrefix, index === node.children.length - 1, "", lines);
  });
}

/**
 * Render a node and its descendants as a box-drawing tree.
 *
 * @param node - Root of the rendered tree
 * @param rootName - Name shown for a root without one
 * @returns One line per node, each ending with a newline
 *
 * @example
 * ```
 * └── repo/
 *     ├── README.md
 *     └── src/
 *         └── main.ts
 * ```
 */
export function renderTree(node: FilesystemNode, rootName: string): string {
  const lines: string[] = [];
  renderLines(node, "", true, rootName, lines);
  return lines.map((line) => `${line}\n`).join("");
}
