/**
 * Tests for full and targeted comparison runs over real files.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, resolve } from "node:path";
import {
  compareAll,
  documentName,
  runFullComparison,
  runTargetedComparison,
  sortSources,
  type RunOptions,
} from "../src/core/matrix.js";
import {
  ConfigurationError,
  MinimumDocumentsError,
  NoCandidatesError,
  PathNotFoundError,
  UnsupportedFormatError,
} from "../src/errors.js";
import { ExtractorRegistry } from "../src/extract/registry.js";
import { plainTextExtractor } from "../src/extract/plain-text.js";
import { listFiles, listSources } from "../src/store/file-store.js";

let dir: string;
let out: string;

async function doc(name: string, text: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text, "utf-8");
  return path;
}

function options(extra: RunOptions = {}): RunOptions {
  return {
    outputDir: out,
    registry: new ExtractorRegistry([plainTextExtractor]),
    concurrency: 2,
    poll: { timeoutMs: 1000, intervalMs: 10 },
    ...extra,
  };
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "doc-overlap-matrix-"));
  out = join(dir, "out");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("helpers", () => {
  it("should name documents by file name without extension", () => {
    expect(documentName("/data/essay.final.txt")).toBe("essay.final");
    expect(documentName("notes")).toBe("notes");
  });

  it("should sort sources by file name", () => {
    expect(sortSources(["/z/b.txt", "/a/c.txt", "/y/a.pdf"])).toEqual(["/y/a.pdf", "/z/b.txt", "/a/c.txt"]);
  });

  it("should order sources the way the store numbers them", async () => {
    await doc("a.txt", "lower");
    await doc("B.txt", "upper");
    await doc("_c.txt", "underscore");

    const stored = (await listFiles(dir)).map((file) => file.fileName);
    const sources = sortSources(await listSources(dir)).map((path) => basename(path));

    expect(stored).toEqual(["B.txt", "_c.txt", "a.txt"]);
    expect(sources).toEqual(stored);
  });
});

describe("runFullComparison", () => {
  it("should score every ordered pair and write one report per pair", async () => {
    const b = await doc("b.txt", "the cat ran");
    const a = await doc("a.txt", "the cat sat");

    const run = await runFullComparison([b, a], options());

    expect(run.mode).toBe("full");
    expect(run.rowNames).toEqual(["a", "b"]);
    expect(run.columnNames).toEqual(["a", "b"]);
    expect(run.matrix[0][0]).toBe(-1);
    expect(run.matrix[1][1]).toBe(-1);
    expect(run.matrix[0][1]).toBeCloseTo(2 / 3, 10);
    expect(run.matrix[1][0]).toBe(run.matrix[0][1]);
    expect(run.outputDir).toBe(resolve(out));
    expect(run.summaryPath).toBe(join(resolve(out), "_results.html"));
    expect([...run.reports.entries()]).toEqual([
      [0, "0.html"],
      [1, "1.html"],
    ]);
    expect((await readdir(out)).sort()).toEqual(["0.html", "1.html", "_results.html"]);

    const summary = await readFile(run.summaryPath, "utf-8");
    expect(summary).toContain(`<td class="high" data-pair="0"><a href="0.html">66.67%</a></td>`);
    expect(summary).toContain(`<td class="high" data-pair="1"><a href="1.html">66.67%</a></td>`);
  });

  it("should render the row document on the left of each report", async () => {
    const a = await doc("a.txt", "one two");
    const b = await doc("b.txt", "two three");

    await runFullComparison([a, b], options());

    const second = await readFile(join(out, "1.html"), "utf-8");
    expect(second).toContain('<div class="header-cell left-header">b</div>');
    expect(second).toContain('<div class="header-cell right-header">a</div>');
  });

  it("should require at least two documents", async () => {
    const a = await doc("a.txt", "alone");
    await expect(runFullComparison([a], options())).rejects.toBeInstanceOf(MinimumDocumentsError);
    expect(existsSync(out)).toBe(false);
  });

  it("should abort on a document with no text", async () => {
    const a = await doc("a.txt", "some words");
    const empty = await doc("empty.txt", "  \n ");
    await expect(runFullComparison([a, empty], options())).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(existsSync(out)).toBe(false);
  });

  it("should abort on a format no extractor handles", async () => {
    const a = await doc("a.txt", "some words");
    const other = await doc("b.xyz", "other words");
    await expect(runFullComparison([a, other], options())).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it("should reject an invalid block size before reading anything", async () => {
    const a = await doc("a.txt", "some words");
    const b = await doc("b.txt", "more words");
    await expect(runFullComparison([a, b], options({ blockSize: 0 }))).rejects.toBeInstanceOf(ConfigurationError);
    expect(existsSync(out)).toBe(false);
  });

  it("should create a timestamped directory under the results root by default", async () => {
    const a = await doc("a.txt", "x y");
    const b = await doc("b.txt", "y z");
    const root = join(dir, "results");

    const run = await runFullComparison([a, b], {
      ...options(),
      outputDir: undefined,
      resultsRoot: root,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    });

    expect(run.outputDir).toBe(resolve(root, "20240102_030405"));
    expect(existsSync(run.summaryPath)).toBe(true);
  });

  it("should produce the same matrix and files regardless of input order", async () => {
    const a = await doc("a.txt", "the cat sat on the mat");
    const b = await doc("b.txt", "a cat sat on a mat");
    const c = await doc("c.txt", "the dog ran home");
    const first = join(dir, "first");
    const second = join(dir, "second");

    const run1 = await runFullComparison([c, a, b], options({ outputDir: first }));
    const run2 = await runFullComparison([b, c, a], options({ outputDir: second, concurrency: 1 }));

    expect(run2.rowNames).toEqual(run1.rowNames);
    expect(run2.matrix).toEqual(run1.matrix);

    const files = (await readdir(first)).sort();
    expect((await readdir(second)).sort()).toEqual(files);
    expect(files).toHaveLength(7);
    for (const file of files) {
      expect(await readFile(join(second, file), "utf-8")).toBe(await readFile(join(first, file), "utf-8"));
    }
  });
});

describe("compareAll", () => {
  it("should fill both halves of the matrix with the same score when matching depends on order", async () => {
    const run = await compareAll(
      [
        { name: "x", tokens: ["t", "i", "d", "e"] },
        { name: "y", tokens: ["d", "i", "e", "t"] },
      ],
      options(),
    );

    expect(run.matrix[0][1]).toBe(0.5);
    expect(run.matrix[1][0]).toBe(run.matrix[0][1]);
  });

  it("should index pairs row-major without the diagonal", async () => {
    const run = await compareAll(
      [
        { name: "x", tokens: ["a", "b", "c"] },
        { name: "y", tokens: ["a", "b", "d"] },
        { name: "z", tokens: ["e"] },
      ],
      options(),
    );

    expect(run.reports.size).toBe(6);
    expect(run.matrix).toEqual([
      [-1, 2 / 3, 0],
      [2 / 3, -1, 0],
      [0, 0, -1],
    ]);
    const summary = await readFile(run.summaryPath, "utf-8");
    expect(summary).toContain(
      `      <tr><th>z</th><td class="low" data-pair="4"><a href="4.html">0.00%</a></td><td class="low" data-pair="5"><a href="5.html">0.00%</a></td><td class="self">-</td></tr>`,
    );
  });
});

describe("runTargetedComparison", () => {
  it("should skip unreadable candidates with a warning and score the rest", async () => {
    const target = await doc("t.txt", "the cat sat");
    const good1 = await doc("good1.txt", "the cat ran");
    const bad = await doc("bad.txt", "");
    const good2 = await doc("good2.txt", "a dog sat");

    const run = await runTargetedComparison(target, [good2, target, bad, good1], options());

    expect(run.mode).toBe("targeted");
    expect(run.rowNames).toEqual(["t"]);
    expect(run.columnNames).toEqual(["good1", "good2"]);
    expect(run.matrix).toHaveLength(1);
    expect(run.matrix[0][0]).toBeCloseTo(2 / 3, 10);
    expect(run.matrix[0][1]).toBeCloseTo(1 / 3, 10);
    expect(run.warnings).toHaveLength(1);
    expect(run.warnings[0]).toMatch(/^Skipping bad\.txt: Cannot extract text from .*bad\.txt: no text found$/);
    expect(run.failures).toEqual([]);
    expect((await readdir(out)).sort()).toEqual(["0.html", "1.html", "_results.html"]);
  });

  it("should fail when every candidate is skipped", async () => {
    const target = await doc("t.txt", "the cat sat");
    const bad = await doc("bad.txt", "");
    await expect(runTargetedComparison(target, [bad], options())).rejects.toBeInstanceOf(NoCandidatesError);
  });

  it("should fail when the only candidate is the target itself", async () => {
    const target = await doc("t.txt", "the cat sat");
    await expect(runTargetedComparison(target, [target], options())).rejects.toBeInstanceOf(NoCandidatesError);
  });

  it("should require the target to be readable", async () => {
    const other = await doc("c.txt", "words");
    await expect(runTargetedComparison(join(dir, "missing.txt"), [other], options())).rejects.toBeInstanceOf(
      PathNotFoundError,
    );
  });
});
