/**
 * Digest formatter.
 *
 * Renders a completed node tree into summary, tree and content text.
 *
 * @module output/digest-formatter
 */

import { contentNodes, resolveContent } from "../ingestion/filesystem-node.js";
import type { FilesystemNode, IngestionQuery } from "../ingestion/types.js";
import { getComponentLogger } from "../logging/index.js";
import {
  assembleContent,
  DEFAULT_ASSEMBLY_THRESHOLDS,
  gatherContentBlocks,
  renderContentBlock,
  selectTier,
} from "./content.js";
import { countLines, createSummaryPrefix, formatCount } from "./summary.js";
import { CharacterRatioTokenizer, estimateTokens, formatTokenCount } from "./tokens.js";
import { renderTree, TREE_HEADER } from "./tree.js";
import type { Digest, FormatOptions } from "./types.js";

/**
 * Format a node tree as a digest.
 *
 * The first content block is rendered once up front as the token sample.
 * Caches of every other node are released as their blocks are produced;
 * releasing the whole tree afterwards is left to the caller.
 *
 * @param node - Root directory node, or a single file node
 * @param query - Query the tree was built for
 * @param options - Tokenizer and assembly thresholds
 */
export async function formatNode(
  node: FilesystemNode,
  query: IngestionQuery,
  options: FormatOptions = {}
): Promise<Digest> {
  const logger = getComponentLogger("output:formatter", query.id);
  const tokenizer = options.tokenizer ?? new CharacterRatioTokenizer();
  const thresholds = { ...DEFAULT_ASSEMBLY_THRESHOLDS, ...options.thresholds };
  const startTime = performance.now();

  let summary = createSummaryPrefix(query, node.kind === "file");

  switch (node.kind) {
    case "directory":
      summary += `Files analyzed: ${node.fileCount}\n`;
      break;
    case "file": {
      const text = await resolveContent(node);
      summary += `File: ${node.name}\n`;
      summary += `Lines: ${formatCount(countLines(text))}\n`;
      break;
    }
    case "symlink":
      break;
  }

  const tree = TREE_HEADER + renderTree(node, query.slug);

  const first = contentNodes(node).next();
  const sample = first.done ? "" : await renderContentBlock(first.value);

  const totalTokens = estimateTokens(tree, sample, node.size, tokenizer);
  const tokenEstimate = formatTokenCount(totalTokens);
  if (tokenEstimate !== null) {
    summary += `\nEstimated tokens: ${tokenEstimate}`;
  }

  const content = await assembleContent(gatherContentBlocks(node), node.size, thresholds);

  logger.debug(
    {
      tier: selectTier(node.size, thresholds),
      files: node.fileCount,
      contentChars: content.length,
      estimatedTokens: totalTokens,
    },
    "Digest formatted"
  );
  logger.info(
    { metric: "format.duration_ms", value: Math.round(performance.now() - startTime) },
    "Formatting completed"
  );

  return { summary, tree, content };
}
