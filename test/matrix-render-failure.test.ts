/**
 * A report that cannot be written: targeted runs keep the score and record
 * the failure, full runs abort.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { compareAll, compareTarget, type RunOptions } from "../src/core/matrix.js";

vi.mock("../src/render/pair-report.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/render/pair-report.js")>();
  return {
    ...actual,
    writePairReport: vi.fn(async (...args: Parameters<typeof actual.writePairReport>) => {
      const input = args[2];
      if (input.names[1] === "broken") {
        throw new Error("disk full");
      }
      return actual.writePairReport(...args);
    }),
  };
});

describe("report write failures", () => {
  let dir: string;
  let options: RunOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "doc-overlap-failure-"));
    options = { outputDir: dir, concurrency: 1, poll: { timeoutMs: 1000, intervalMs: 10 } };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should keep the score and leave the cell unlinked in targeted mode", async () => {
    const run = await compareTarget(
      { name: "t", tokens: ["the", "cat", "sat"] },
      [
        { name: "broken", tokens: ["the", "cat", "ran"] },
        { name: "ok", tokens: ["the", "dog"] },
      ],
      options,
    );

    expect(run.matrix[0][0]).toBeCloseTo(2 / 3, 10);
    expect(run.matrix[0][1]).toBeCloseTo(0.4, 10);
    expect(run.failures).toEqual([{ pairIndex: 0, names: ["t", "broken"], message: "disk full" }]);
    expect([...run.reports.entries()]).toEqual([[1, "1.html"]]);

    const summary = await readFile(run.summaryPath, "utf-8");
    expect(summary).toContain(`<td class="high" data-pair="0">66.67%</td>`);
    expect(summary).toContain(`<td class="mid" data-pair="1"><a href="1.html">40.00%</a></td>`);
  });

  it("should reject with the write error in full mode", async () => {
    await expect(
      compareAll(
        [
          { name: "a", tokens: ["x", "y"] },
          { name: "broken", tokens: ["y", "z"] },
        ],
        options,
      ),
    ).rejects.toThrow("disk full");
  });
});
