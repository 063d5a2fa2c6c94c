import { describe, it, expect } from "vitest";
import { findLongestMatch, getMatchingBlocks, matchedLength } from "../src/core/sequence-matcher.js";
import { tokenize } from "../src/text/tokens.js";

describe("findLongestMatch", () => {
  it("should find the longest contiguous run", () => {
    const a = ["a", "b", "c", "d"];
    const b = ["x", "b", "c", "y"];
    expect(findLongestMatch(a, b, 0, 4, 0, 4)).toEqual({ aStart: 1, bStart: 1, length: 2 });
  });

  it("should prefer the earliest start in the first sequence on ties", () => {
    const a = ["x", "y"];
    const b = ["y", "x"];
    expect(findLongestMatch(a, b, 0, 2, 0, 2)).toEqual({ aStart: 0, bStart: 1, length: 1 });
  });

  it("should prefer the earliest start in the second sequence on ties", () => {
    expect(findLongestMatch(["x"], ["x", "x"], 0, 1, 0, 2)).toEqual({ aStart: 0, bStart: 0, length: 1 });
  });

  it("should stay inside the given ranges", () => {
    const a = ["p", "q", "r", "p", "q"];
    const b = ["p", "q"];
    expect(findLongestMatch(a, b, 2, 5, 0, 2)).toEqual({ aStart: 3, bStart: 0, length: 2 });
  });

  it("should return a zero-length block at the range start when nothing matches", () => {
    expect(findLongestMatch(["a", "b"], ["c", "d"], 1, 2, 1, 2)).toEqual({ aStart: 1, bStart: 1, length: 0 });
  });
});

describe("getMatchingBlocks", () => {
  it("should cover a shared prefix and end with the sentinel", () => {
    const blocks = getMatchingBlocks(tokenize("the cat sat"), tokenize("the cat ran"));
    expect(blocks).toEqual([
      { aStart: 0, bStart: 0, length: 2 },
      { aStart: 3, bStart: 3, length: 0 },
    ]);
  });

  it("should find blocks on both sides of the longest match", () => {
    const a = tokenize("one two three four five six");
    const b = tokenize("one zero three four nine six");
    expect(getMatchingBlocks(a, b)).toEqual([
      { aStart: 0, bStart: 0, length: 1 },
      { aStart: 2, bStart: 2, length: 2 },
      { aStart: 5, bStart: 5, length: 1 },
      { aStart: 6, bStart: 6, length: 0 },
    ]);
  });

  it("should cover identical sequences with a single block", () => {
    const a = tokenize("a b c d");
    expect(getMatchingBlocks(a, [...a])).toEqual([
      { aStart: 0, bStart: 0, length: 4 },
      { aStart: 4, bStart: 4, length: 0 },
    ]);
  });

  it("should return only the sentinel for disjoint sequences", () => {
    expect(getMatchingBlocks(["a", "b"], ["c", "d", "e"])).toEqual([{ aStart: 2, bStart: 3, length: 0 }]);
  });

  it("should handle thousands of blocks without recursion", () => {
    const a: string[] = [];
    const b: string[] = [];
    for (let i = 0; i < 1000; i++) {
      a.push(`t${i}`, `left${i}`);
      b.push(`t${i}`, `right${i}`);
    }

    const blocks = getMatchingBlocks(a, b);
    expect(blocks).toHaveLength(1001);
    expect(matchedLength(blocks)).toBe(1000);
    expect(blocks[999]).toEqual({ aStart: 1998, bStart: 1998, length: 1 });
  });
});
