/**
 * Matching-block decomposition of two token sequences.
 * Pure functions: find the longest common contiguous run, then repeat on the
 * ranges left and right of it until no common token remains.
 */

/**
 * A contiguous run shared by both sequences:
 * a[aStart..aStart+length) equals b[bStart..bStart+length).
 */
export interface MatchingBlock {
  /** Start index in the first (left) sequence */
  aStart: number;
  /** Start index in the second (right) sequence */
  bStart: number;
  /** Number of matching tokens in the run */
  length: number;
}

/** Index of every position at which each token occurs in b (ascending). */
export type TokenIndex = Map<string, number[]>;

export function indexTokens(b: readonly string[]): TokenIndex {
  const index: TokenIndex = new Map();
  b.forEach((token, j) => {
    const positions = index.get(token);
    if (positions) {
      positions.push(j);
    } else {
      index.set(token, [j]);
    }
  });
  return index;
}

/**
 * Find the longest contiguous common run between a[aLo..aHi) and b[bLo..bHi).
 * Ties go to the earliest start in a, then the earliest start in b.
 * Returns a zero-length block at (aLo, bLo) when nothing matches.
 */
export function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
  index: TokenIndex = indexTokens(b),
): MatchingBlock {
  let bestA = aLo;
  let bestB = bLo;
  let bestLen = 0;

  // runLength.get(j) = length of the run ending at a[i-1], b[j]
  let runLength = new Map<number, number>();
  let next = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    next.clear();
    const positions = index.get(a[i]);
    if (positions) {
      for (const j of positions) {
        if (j < bLo) continue;
        if (j >= bHi) break;
        const k = (runLength.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestLen) {
          bestA = i - k + 1;
          bestB = j - k + 1;
          bestLen = k;
        }
      }
    }
    [runLength, next] = [next, runLength];
  }

  return { aStart: bestA, bStart: bestB, length: bestLen };
}

/**
 * Decompose two sequences into ordered, non-overlapping matching blocks.
 * Adjacent blocks are merged, and the list always ends with the sentinel
 * { aStart: a.length, bStart: b.length, length: 0 }.
 *
 * Ranges are processed from an explicit worklist so stack depth stays
 * constant regardless of document length.
 */
export function getMatchingBlocks(a: readonly string[], b: readonly string[]): MatchingBlock[] {
  const index = indexTokens(b);
  const found: MatchingBlock[] = [];
  const worklist: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (worklist.length > 0) {
    const range = worklist.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;

    const match = findLongestMatch(a, b, aLo, aHi, bLo, bHi, index);
    if (match.length === 0) continue;

    found.push(match);
    if (aLo < match.aStart && bLo < match.bStart) {
      worklist.push([aLo, match.aStart, bLo, match.bStart]);
    }
    const aEnd = match.aStart + match.length;
    const bEnd = match.bStart + match.length;
    if (aEnd < aHi && bEnd < bHi) {
      worklist.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  found.sort((x, y) => x.aStart - y.aStart || x.bStart - y.bStart);

  const merged: MatchingBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.aStart + last.length === block.aStart && last.bStart + last.length === block.bStart) {
      merged[merged.length - 1] = { ...last, length: last.length + block.length };
    } else {
      merged.push(block);
    }
  }

  merged.push({ aStart: a.length, bStart: b.length, length: 0 });
  return merged;
}

/**
 * Total number of tokens covered by the blocks.
 */
export function matchedLength(blocks: readonly MatchingBlock[]): number {
  return blocks.reduce((sum, block) => sum + block.length, 0);
}
