/**
 * Summary report: the score matrix as an HTML table, cross-linked to the
 * pairwise reports.
 *
 * Writing happens in two steps. The table is rendered with a data-pair
 * marker on every scored cell, and once the file is observable on disk the
 * markers are turned into links for the reports that were actually written.
 */
import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { POLL_CONFIG, REPORT_CONFIG } from "../config.js";
import { ReportNotPersistedError } from "../errors.js";
import { escapeHtml, formatPercent } from "../text/html.js";
import { generateSummaryHtml } from "../ui/template.js";
import type { ThemeName } from "../ui/themes.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("summary");

/** Score reserved for self-pairs on the diagonal */
export const SELF_SCORE = -1;

export type RunMode = "full" | "targeted";

export interface SummaryTable {
  mode: RunMode;
  matrix: readonly (readonly number[])[];
  rowNames: readonly string[];
  columnNames: readonly string[];
}

export interface PollOptions {
  timeoutMs?: number;
  intervalMs?: number;
}

export interface AssembleOptions extends PollOptions {
  theme?: ThemeName;
  title?: string;
}

/**
 * Running pair index for a cell. Full mode counts ordered pairs row by row,
 * skipping the diagonal; targeted mode has one pair per column.
 */
export function pairIndexFor(mode: RunMode, size: number, row: number, col: number): number | null {
  if (mode === "targeted") return col;
  if (row === col) return null;
  return row * (size - 1) + (col < row ? col : col - 1);
}

function scoreBand(score: number): "high" | "mid" | "low" {
  if (score >= 0.5) return "high";
  if (score >= 0.2) return "mid";
  return "low";
}

/**
 * Render the score matrix as an HTML table.
 */
export function renderSummaryTable(table: SummaryTable): string {
  const { mode, matrix, rowNames, columnNames } = table;
  const header = ["<th></th>", ...columnNames.map((name) => `<th>${escapeHtml(name)}</th>`)].join("");

  const rows = matrix.map((cells, row) => {
    const rendered = cells.map((value, col) => {
      const pairIndex = pairIndexFor(mode, columnNames.length, row, col);
      if (pairIndex === null || value === SELF_SCORE) {
        return `<td class="self">-</td>`;
      }
      const percent = formatPercent(value, REPORT_CONFIG.PERCENT_DECIMALS);
      return `<td class="${scoreBand(value)}" data-pair="${pairIndex}">${percent}</td>`;
    });
    return `      <tr><th>${escapeHtml(rowNames[row] ?? "")}</th>${rendered.join("")}</tr>`;
  });

  return [
    `<table class="results">`,
    `    <thead><tr>${header}</tr></thead>`,
    `    <tbody>`,
    ...rows,
    `    </tbody>`,
    `</table>`,
  ].join("\n");
}

/**
 * Poll until a file exists or the deadline passes.
 * Resolves false on timeout rather than throwing.
 */
export async function waitForFile(path: string, options: PollOptions = {}): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? POLL_CONFIG.TIMEOUT_MS;
  const intervalMs = options.intervalMs ?? POLL_CONFIG.INTERVAL_MS;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    if (existsSync(path)) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(intervalMs, remaining));
  }
}

const SCORED_CELL = /<td([^>]*?) data-pair="(\d+)">([\s\S]*?)<\/td>/g;

/**
 * Wrap each scored cell in a link to its pairwise report.
 * Cells already linked, or without a written report, are left as they are,
 * so running this twice produces the same file.
 */
export async function addLinksToTable(summaryPath: string, reports: ReadonlyMap<number, string>): Promise<number> {
  const html = await readFile(summaryPath, "utf-8");
  let linked = 0;

  const patched = html.replace(SCORED_CELL, (cell: string, attrs: string, index: string, content: string) => {
    const report = reports.get(Number(index));
    if (!report || content.startsWith("<a ")) return cell;
    linked++;
    return `<td${attrs} data-pair="${index}"><a href="${escapeHtml(report)}">${content}</a></td>`;
  });

  if (patched !== html) {
    await writeFile(summaryPath, patched, "utf-8");
  }
  debug("linked", linked, "cells");
  return linked;
}

/**
 * Write _results.html, confirm it is on disk, then link its cells.
 * @returns Absolute or relative path of the summary, as joined from outputDir
 */
export async function assembleSummary(
  table: SummaryTable,
  outputDir: string,
  reports: ReadonlyMap<number, string>,
  options: AssembleOptions = {},
): Promise<string> {
  const summaryPath = join(outputDir, REPORT_CONFIG.SUMMARY_FILENAME);
  const title = options.title ?? "Overlap results";

  await writeFile(summaryPath, generateSummaryHtml(renderSummaryTable(table), title, options.theme), "utf-8");

  const timeoutMs = options.timeoutMs ?? POLL_CONFIG.TIMEOUT_MS;
  if (!(await waitForFile(summaryPath, { timeoutMs, intervalMs: options.intervalMs }))) {
    throw new ReportNotPersistedError(summaryPath, timeoutMs);
  }

  await addLinksToTable(summaryPath, reports);
  return summaryPath;
}
