/**
 * Digest output module
 *
 * Renders the node tree built by ingestion into summary, tree and content text.
 *
 * @module output
 */

export type { Digest, Tokenizer, AssemblyThresholds, FormatOptions } from "./types.js";
export { formatNode } from "./digest-formatter.js";
export {
  SEPARATOR,
  DEFAULT_ASSEMBLY_THRESHOLDS,
  type AssemblyTier,
  selectTier,
  renderContentBlock,
  gatherContentBlocks,
  assembleContent,
} from "./content.js";
export { TREE_HEADER, renderTree } from "./tree.js";
export {
  TOKEN_SAMPLE_CHARS,
  CharacterRatioTokenizer,
  estimateTokens,
  formatTokenCount,
} from "./tokens.js";
export { createSummaryPrefix, countLines, formatCount } from "./summary.js";
