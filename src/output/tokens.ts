/**
 * Token estimation.
 *
 * @module output/tokens
 */

import type { Tokenizer } from "./types.js";

/**
 * Characters of content sampled for the estimate
 */
export const TOKEN_SAMPLE_CHARS = 10_000;

const TOKEN_THRESHOLDS: ReadonlyArray<readonly [number, string]> = [
  [1_000_000, "M"],
  [1_000, "k"],
];

/**
 * Approximate tokenizer: one token per `charsPerToken` characters, rounded up.
 */
export class CharacterRatioTokenizer implements Tokenizer {
  private readonly charsPerToken: number;

  constructor(charsPerToken: number = 4) {
    if (!(charsPerToken > 0)) {
      throw new Error("charsPerToken must be greater than 0");
    }
    this.charsPerToken = charsPerToken;
  }

  countTokens(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }
}

/**
 * Estimate the token count of a digest from its tree and one content sample.
 *
 * The sample's tokens-per-character rate is applied to the total content
 * size in bytes. Without a sample only the tree is counted.
 *
 * @param treeText - Rendered tree
 * @param sample - First content block, or "" when there is none
 * @param contentBytes - Total size of the recorded files
 * @param tokenizer - Token counter
 */
export function estimateTokens(
  treeText: string,
  sample: string,
  contentBytes: number,
  tokenizer: Tokenizer
): number {
  const treeTokens = tokenizer.countTokens(treeText);
  const truncated = sample.slice(0, TOKEN_SAMPLE_CHARS);
  const sampleTokens = truncated.length > 0 ? tokenizer.countTokens(truncated) : 0;

  if (sampleTokens === 0) {
    return treeTokens;
  }

  const rate = sampleTokens / truncated.length;
  return treeTokens + Math.floor(contentBytes * rate);
}

/**
 * `total / threshold` to one decimal place, rounding ties to the even digit.
 * Only x.25 and x.75 are exact ties in binary; `toFixed` rounds them up.
 */
function toTenths(total: number, threshold: number): string {
  const twentieths = (total * 20) / threshold;
  if (Number.isInteger(twentieths) && twentieths % 10 === 5) {
    const lower = Math.floor(twentieths / 2);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }
  return (total / threshold).toFixed(1);
}

/**
 * Human-readable token count ("950", "1.5k", "2.5M").
 *
 * @returns The formatted count, or null for 0
 */
export function formatTokenCount(total: number): string | null {
  if (total === 0) {
    return null;
  }

  for (const [threshold, suffix] of TOKEN_THRESHOLDS) {
    if (total >= threshold) {
      return `${toTenths(total, threshold)}${suffix}`;
    }
  }

  return String(total);
}
