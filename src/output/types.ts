/**
 * Type definitions for digest formatting.
 *
 * @module output/types
 */

/**
 * Rendered result of one ingestion
 */
export interface Digest {
  /**
   * Header lines: source, ref, file count or line count, token estimate
   */
  summary: string;

  /**
   * "Directory structure:" followed by the box-drawing tree
   */
  tree: string;

  /**
   * Concatenated content blocks of every file and symlink
   */
  content: string;
}

/**
 * Counts tokens in a piece of text.
 *
 * Implementations may be exact (a model tokenizer) or approximate.
 */
export interface Tokenizer {
  countTokens(text: string): number;
}

/**
 * Size thresholds selecting the content assembly strategy
 *
 * Every strategy produces the same string; they differ only in how many
 * intermediate pieces are held at once.
 */
export interface AssemblyThresholds {
  /**
   * Total tree size (bytes) from which pieces are rolled into one string periodically
   * @default 10 MB
   */
  mediumTierBytes: number;

  /**
   * Total tree size (bytes) from which the buffer is compacted by file count
   * @default 100 MB
   */
  largeTierBytes: number;

  /**
   * Accumulated characters that trigger a roll-up in the medium tier
   * @default 5 MB
   */
  rollUpChars: number;

  /**
   * Files between two compactions in the large tier
   * @default 100
   */
  compactEveryFiles: number;
}

/**
 * Options for {@link formatNode}
 */
export interface FormatOptions {
  /**
   * Tokenizer used for the estimate
   * @default CharacterRatioTokenizer
   */
  tokenizer?: Tokenizer;

  /**
   * Assembly thresholds, merged over the defaults
   */
  thresholds?: Partial<AssemblyThresholds>;
}
