/**
 * Terminal output for comparison runs and store listings.
 */

import type { ComparisonRun } from "../core/matrix.js";
import { SELF_SCORE } from "../report/summary.js";
import { formatSize, type StoredFile } from "../store/file-store.js";
import { formatPercent } from "../text/html.js";
import { c, logSuccess, logWarn } from "./colors.js";
import { computeStats, formatStats } from "./stats.js";

export interface OutputOptions {
  quiet: boolean;
  noOpen: boolean;
}

function log(msg: string, quiet: boolean): void {
  if (!quiet) console.log(msg);
}

/**
 * Plain-text rendering of the score matrix.
 */
export function renderMatrix(run: ComparisonRun): string {
  const width = Math.max(8, ...run.columnNames.map((name) => name.length));
  const rowWidth = Math.max(...run.rowNames.map((name) => name.length));
  const header = " ".repeat(rowWidth) + "  " + run.columnNames.map((name) => name.padStart(width)).join(" ");

  const rows = run.matrix.map((cells, row) => {
    const rendered = cells.map((value, col) =>
      run.mode === "full" && (row === col || value === SELF_SCORE) ? "-".padStart(width) : formatPercent(value).padStart(width),
    );
    return `${run.rowNames[row].padEnd(rowWidth)}  ${rendered.join(" ")}`;
  });

  return [header, ...rows].join("\n");
}

export function reportRun(run: ComparisonRun, opts: OutputOptions): void {
  for (const warning of run.warnings) {
    logWarn(warning);
  }
  for (const failure of run.failures) {
    logWarn(`Report for ${failure.names[0]} ↔ ${failure.names[1]} not written: ${failure.message}`);
  }

  log("", opts.quiet);
  log(renderMatrix(run), opts.quiet);
  log("", opts.quiet);
  log(formatStats(computeStats(run)), opts.quiet);
  logSuccess(`Results saved at: ${run.summaryPath}`);
}

export function renderFileList(files: readonly StoredFile[]): string {
  if (files.length === 0) {
    return `${c.dim}No files stored${c.reset}`;
  }
  return files
    .map((file) => `  ${c.cyan}[${file.id}]${c.reset} ${file.fileName} ${c.dim}${file.extension} ${formatSize(file.size)}${c.reset}`)
    .join("\n");
}

export async function openInBrowser(path: string): Promise<void> {
  const mod = await import("open");
  await mod.default(path);
}
