/**
 * Tests for terminal rendering of run results.
 */
import { describe, it, expect } from "vitest";
import type { ComparisonRun } from "../src/core/matrix.js";
import { renderMatrix } from "../src/cli/output.js";
import { computeStats } from "../src/cli/stats.js";

function run(overrides: Partial<ComparisonRun>): ComparisonRun {
  return {
    mode: "full",
    matrix: [],
    rowNames: [],
    columnNames: [],
    outputDir: "/tmp/out",
    summaryPath: "/tmp/out/_results.html",
    reports: new Map(),
    warnings: [],
    failures: [],
    ...overrides,
  };
}

describe("renderMatrix", () => {
  it("should right-align percentages and dash the diagonal", () => {
    const text = renderMatrix(
      run({
        matrix: [
          [-1, 0.5],
          [0.5, -1],
        ],
        rowNames: ["a", "b"],
        columnNames: ["a", "b"],
      }),
    );

    expect(text.split("\n")).toEqual([
      "          a        b",
      "a         -   50.00%",
      "b    50.00%        -",
    ]);
  });
});

describe("computeStats", () => {
  it("should skip the diagonal in full mode", () => {
    const stats = computeStats(
      run({
        matrix: [
          [-1, 0.5, 0.1],
          [0.5, -1, 0.3],
          [0.1, 0.3, -1],
        ],
        rowNames: ["a", "b", "c"],
        columnNames: ["a", "b", "c"],
        reports: new Map([[0, "0.html"]]),
      }),
    );

    expect(stats.pairsCompared).toBe(6);
    expect(stats.reportsWritten).toBe(1);
    expect(stats.averageOverlap).toBeCloseTo(0.3, 10);
    expect(stats.top).toEqual({ left: "a", right: "b", overlap: 0.5 });
  });

  it("should count every cell of a targeted row", () => {
    const stats = computeStats(
      run({ mode: "targeted", matrix: [[0, 0.25]], rowNames: ["t"], columnNames: ["x", "y"] }),
    );

    expect(stats.pairsCompared).toBe(2);
    expect(stats.top).toEqual({ left: "t", right: "y", overlap: 0.25 });
  });
});
