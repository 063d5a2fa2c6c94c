/**
 * Overlap score between two token sequences.
 */

import { compareCodeUnits } from "../text/tokens.js";
import { getMatchingBlocks, matchedLength, type MatchingBlock } from "./sequence-matcher.js";

export interface OverlapResult {
  /** 2 * matched / (len(a) + len(b)), in [0, 1] */
  overlap: number;
  /** Matching blocks in a/b coordinates, sentinel-terminated */
  blocks: MatchingBlock[];
}

/**
 * Order two sequences by length, then token by token.
 * Greedy block matching is orientation-sensitive, so blocks are always
 * computed with the smaller sequence first and swapped back afterwards.
 */
export function compareSequences(a: readonly string[], b: readonly string[]): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return compareCodeUnits(a[i], b[i]);
  }
  return 0;
}

function swapBlocks(blocks: MatchingBlock[]): MatchingBlock[] {
  return blocks.map((block) => ({ aStart: block.bStart, bStart: block.aStart, length: block.length }));
}

/**
 * Score two token sequences and return the block decomposition used for
 * rendering. score(a, b) and score(b, a) agree, and their blocks are mirror
 * images of each other.
 */
export function score(a: readonly string[], b: readonly string[]): OverlapResult {
  const total = a.length + b.length;
  if (total === 0) {
    return { overlap: 0, blocks: [{ aStart: 0, bStart: 0, length: 0 }] };
  }

  const blocks = compareSequences(a, b) <= 0
    ? getMatchingBlocks(a, b)
    : swapBlocks(getMatchingBlocks(b, a));

  const overlap = (2 * matchedLength(blocks)) / total;
  return { overlap: Math.min(1, Math.max(0, overlap)), blocks };
}

/**
 * Overlap score only.
 */
export function overlapScore(a: readonly string[], b: readonly string[]): number {
  return score(a, b).overlap;
}
