/**
 * Comparison matrix builder - drives scoring and pairwise rendering over a
 * document set, then hands the matrix to the summary assembler.
 *
 * Two modes share the same primitives:
 * - full: every ordered pair of N documents (N×(N−1) scores and reports)
 * - targeted: one document against a candidate set (a single row)
 *
 * Full mode is strict: an unreadable input or a failed report aborts the run.
 * Targeted mode skips unreadable candidates and failed reports, recording
 * them as warnings and failures on the result.
 */
import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { REPORT_CONFIG, STORE_CONFIG } from "../config.js";
import {
  ConfigurationError,
  MinimumDocumentsError,
  NoCandidatesError,
  errorMessage,
} from "../errors.js";
import { createDefaultRegistry, type ExtractorRegistry } from "../extract/index.js";
import { writePairReport } from "../render/pair-report.js";
import { validateBlockSize } from "../render/spans.js";
import { assembleSummary, SELF_SCORE, type PollOptions, type RunMode } from "../report/summary.js";
import type { ThemeName } from "../ui/themes.js";
import { createDebugLogger, createTimer } from "../debug.js";
import { compareCodeUnits } from "../text/tokens.js";
import { mapSettled, type UnitResult } from "./pool.js";
import { score } from "./similarity.js";

const debug = createDebugLogger("matrix");

// ─── Types ──────────────────────────────────────────────────────────────────

export interface Document {
  /** Source file name without its extension */
  name: string;
  tokens: readonly string[];
}

export interface RunOptions {
  /** Directory for reports; created when missing. Defaults to a timestamped directory. */
  outputDir?: string;
  /** Parent of timestamped result directories */
  resultsRoot?: string;
  /** Tokens per highlighted chunk */
  blockSize?: number;
  theme?: ThemeName;
  /** Pair units in flight at once */
  concurrency?: number;
  registry?: ExtractorRegistry;
  poll?: PollOptions;
  /** Clock for timestamped directory names */
  now?: () => Date;
}

export interface PairFailure {
  pairIndex: number;
  names: [string, string];
  message: string;
}

export interface ComparisonRun {
  mode: RunMode;
  matrix: number[][];
  rowNames: string[];
  columnNames: string[];
  outputDir: string;
  summaryPath: string;
  /** Pair index → report file name, relative to outputDir */
  reports: Map<number, string>;
  /** Inputs skipped during targeted runs */
  warnings: string[];
  /** Pairs whose report could not be written (targeted runs only) */
  failures: PairFailure[];
}

interface PairUnit {
  pairIndex: number;
  row: number;
  col: number;
  left: Document;
  right: Document;
}

/** Scoring always completes; the report write may fail on its own */
type PairOutcome =
  | { overlap: number; report: string }
  | { overlap: number; report: null; error: unknown };

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Stable identifier of a source file: its name minus the extension */
export function documentName(path: string): string {
  const file = basename(path);
  return file.slice(0, file.length - extname(file).length);
}

/**
 * Sources in code-unit order of their file names, the same order the store
 * numbers them in.
 */
export function sortSources(paths: readonly string[]): string[] {
  return [...paths].sort((a, b) => compareCodeUnits(basename(a), basename(b)) || compareCodeUnits(a, b));
}

function timestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Use the caller's output directory, or create results/<YYYYMMDD_HHMMSS>.
 */
export async function resolveOutputDir(options: RunOptions): Promise<string> {
  const dir = options.outputDir
    ? resolve(options.outputDir)
    : resolve(options.resultsRoot ?? STORE_CONFIG.RESULTS_ROOT, timestamp((options.now ?? (() => new Date()))()));
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  return dir;
}

function resolveBlockSize(options: RunOptions): number {
  const blockSize = options.blockSize ?? REPORT_CONFIG.DEFAULT_BLOCK_SIZE;
  validateBlockSize(blockSize);
  return blockSize;
}

function resolveConcurrency(options: RunOptions): number | undefined {
  if (options.concurrency === undefined) return undefined;
  if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${options.concurrency}`);
  }
  return options.concurrency;
}

function firstFailure<T>(results: UnitResult<T>[]): unknown {
  for (const result of results) {
    if (!result.ok) return result.error;
  }
  return undefined;
}

// ─── Extraction ─────────────────────────────────────────────────────────────

/**
 * Extract every source. Any failure aborts with that source's error.
 */
export async function loadDocuments(
  paths: readonly string[],
  registry: ExtractorRegistry,
  concurrency?: number,
): Promise<Document[]> {
  const results = await mapSettled(
    paths,
    async (path) => ({ name: documentName(path), tokens: await registry.extract(path) }),
    concurrency,
  );
  const failure = firstFailure(results);
  if (failure !== undefined) throw failure;
  return results.flatMap((result) => (result.ok ? [result.value] : []));
}

/**
 * Extract candidates, skipping the ones that fail.
 */
export async function loadCandidates(
  paths: readonly string[],
  registry: ExtractorRegistry,
  concurrency?: number,
): Promise<{ documents: Document[]; warnings: string[] }> {
  const results = await mapSettled(
    paths,
    async (path) => ({ name: documentName(path), tokens: await registry.extract(path) }),
    concurrency,
  );

  const documents: Document[] = [];
  const warnings: string[] = [];
  results.forEach((result, i) => {
    if (result.ok) {
      documents.push(result.value);
    } else {
      const warning = `Skipping ${basename(paths[i])}: ${errorMessage(result.error)}`;
      debug(warning);
      warnings.push(warning);
    }
  });
  return { documents, warnings };
}

// ─── Pair Units ─────────────────────────────────────────────────────────────

async function runPairs(
  units: readonly PairUnit[],
  outputDir: string,
  blockSize: number,
  options: RunOptions,
  concurrency?: number,
): Promise<PairOutcome[]> {
  const results = await mapSettled(
    units,
    async (unit): Promise<PairOutcome> => {
      const { overlap, blocks } = score(unit.left.tokens, unit.right.tokens);
      try {
        const report = await writePairReport(
          outputDir,
          unit.pairIndex,
          {
            left: unit.left.tokens,
            right: unit.right.tokens,
            blocks,
            names: [unit.left.name, unit.right.name],
            overlap,
          },
          blockSize,
          options.theme,
        );
        return { overlap, report };
      } catch (error) {
        return { overlap, report: null, error };
      }
    },
    concurrency,
  );

  const failure = firstFailure(results);
  if (failure !== undefined) throw failure;
  return results.flatMap((result) => (result.ok ? [result.value] : []));
}

// ─── Full Mode ──────────────────────────────────────────────────────────────

/**
 * Compare every ordered pair of already-extracted documents.
 * Documents are taken in the order given.
 */
export async function compareAll(documents: readonly Document[], options: RunOptions = {}): Promise<ComparisonRun> {
  if (documents.length < 2) {
    throw new MinimumDocumentsError(documents.length);
  }
  const blockSize = resolveBlockSize(options);
  const concurrency = resolveConcurrency(options);
  const outputDir = await resolveOutputDir(options);
  const timer = createTimer("full");

  const units: PairUnit[] = [];
  for (let row = 0; row < documents.length; row++) {
    for (let col = 0; col < documents.length; col++) {
      if (row === col) continue;
      units.push({ pairIndex: units.length, row, col, left: documents[row], right: documents[col] });
    }
  }
  debug("full mode:", documents.length, "documents,", units.length, "pairs");

  const outcomes = await timer.timeAsync("compare", () => runPairs(units, outputDir, blockSize, options, concurrency));
  for (const outcome of outcomes) {
    if (outcome.report === null) throw outcome.error;
  }

  const matrix: number[][] = documents.map((_doc, row) => documents.map((_other, col) => (row === col ? SELF_SCORE : 0)));
  const reports = new Map<number, string>();
  outcomes.forEach((outcome, i) => {
    const unit = units[i];
    matrix[unit.row][unit.col] = outcome.overlap;
    if (outcome.report !== null) reports.set(unit.pairIndex, outcome.report);
  });

  const names = documents.map((doc) => doc.name);
  const summaryPath = await timer.timeAsync("summary", () =>
    assembleSummary({ mode: "full", matrix, rowNames: names, columnNames: names }, outputDir, reports, {
      theme: options.theme,
      title: `Overlap results: ${documents.length} documents`,
      ...options.poll,
    }),
  );
  timer.done();

  return {
    mode: "full",
    matrix,
    rowNames: names,
    columnNames: names,
    outputDir,
    summaryPath,
    reports,
    warnings: [],
    failures: [],
  };
}

/**
 * Full mode over source files: extract all (strict), then compare all pairs.
 */
export async function runFullComparison(paths: readonly string[], options: RunOptions = {}): Promise<ComparisonRun> {
  if (paths.length < 2) {
    throw new MinimumDocumentsError(paths.length);
  }
  resolveBlockSize(options);
  const registry = options.registry ?? createDefaultRegistry();
  const documents = await loadDocuments(sortSources(paths), registry, resolveConcurrency(options));
  return compareAll(documents, options);
}

// ─── Targeted Mode ──────────────────────────────────────────────────────────

/**
 * Compare one document against candidates (excluding any with its name).
 * Failed reports are recorded; their scores are kept.
 */
export async function compareTarget(
  target: Document,
  candidates: readonly Document[],
  options: RunOptions = {},
  warnings: string[] = [],
): Promise<ComparisonRun> {
  const blockSize = resolveBlockSize(options);
  const concurrency = resolveConcurrency(options);
  const others = candidates.filter((doc) => doc.name !== target.name);
  if (others.length === 0) {
    throw new NoCandidatesError(target.name);
  }
  const outputDir = await resolveOutputDir(options);
  const timer = createTimer(`targeted ${target.name}`);

  const units: PairUnit[] = others.map((doc, col) => ({ pairIndex: col, row: 0, col, left: target, right: doc }));
  debug("targeted mode:", target.name, "vs", others.length, "candidates");

  const outcomes = await timer.timeAsync("compare", () => runPairs(units, outputDir, blockSize, options, concurrency));

  const row = outcomes.map((outcome) => outcome.overlap);
  const reports = new Map<number, string>();
  const failures: PairFailure[] = [];
  outcomes.forEach((outcome, i) => {
    const unit = units[i];
    if (outcome.report !== null) {
      reports.set(unit.pairIndex, outcome.report);
      return;
    }
    const failure: PairFailure = {
      pairIndex: unit.pairIndex,
      names: [unit.left.name, unit.right.name],
      message: errorMessage(outcome.error),
    };
    debug("report failed:", failure);
    failures.push(failure);
  });

  const columnNames = others.map((doc) => doc.name);
  const matrix: number[][] = [row];
  const summaryPath = await timer.timeAsync("summary", () =>
    assembleSummary({ mode: "targeted", matrix, rowNames: [target.name], columnNames }, outputDir, reports, {
      theme: options.theme,
      title: `Overlap results: ${target.name}`,
      ...options.poll,
    }),
  );
  timer.done();

  return {
    mode: "targeted",
    matrix,
    rowNames: [target.name],
    columnNames,
    outputDir,
    summaryPath,
    reports,
    warnings,
    failures,
  };
}

/**
 * Targeted mode over source files. The target must extract; candidates that
 * do not are skipped with a warning.
 */
export async function runTargetedComparison(
  targetPath: string,
  candidatePaths: readonly string[],
  options: RunOptions = {},
): Promise<ComparisonRun> {
  resolveBlockSize(options);
  const concurrency = resolveConcurrency(options);
  const registry = options.registry ?? createDefaultRegistry();

  const target: Document = { name: documentName(targetPath), tokens: await registry.extract(targetPath) };
  const candidates = sortSources(candidatePaths).filter((path) => documentName(path) !== target.name);
  const { documents, warnings } = await loadCandidates(candidates, registry, concurrency);
  if (documents.length === 0) {
    throw new NoCandidatesError(target.name);
  }

  return compareTarget(target, documents, options, warnings);
}
