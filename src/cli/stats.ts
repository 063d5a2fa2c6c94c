/**
 * Run statistics computation and formatting.
 */

import type { ComparisonRun } from "../core/matrix.js";
import { SELF_SCORE } from "../report/summary.js";
import { formatPercent } from "../text/html.js";
import { c } from "./colors.js";

export interface RunStats {
  pairsCompared: number;
  reportsWritten: number;
  averageOverlap: number;
  /** Highest-scoring pair, or null when nothing was scored */
  top: { left: string; right: string; overlap: number } | null;
}

export function computeStats(run: ComparisonRun): RunStats {
  let pairsCompared = 0;
  let sum = 0;
  let top: RunStats["top"] = null;

  for (let row = 0; row < run.matrix.length; row++) {
    const cells = run.matrix[row];
    for (let col = 0; col < cells.length; col++) {
      const value = cells[col];
      if (run.mode === "full" && (row === col || value === SELF_SCORE)) continue;
      pairsCompared++;
      sum += value;
      if (!top || value > top.overlap) {
        top = { left: run.rowNames[row], right: run.columnNames[col], overlap: value };
      }
    }
  }

  return {
    pairsCompared,
    reportsWritten: run.reports.size,
    averageOverlap: pairsCompared > 0 ? sum / pairsCompared : 0,
    top,
  };
}

export function formatStats(stats: RunStats): string {
  if (stats.pairsCompared === 0) {
    return `${c.dim}No pairs compared${c.reset}`;
  }

  const parts = [
    `${c.bold}${stats.pairsCompared}${c.reset} pair${stats.pairsCompared !== 1 ? "s" : ""} compared`,
    `average ${formatPercent(stats.averageOverlap)}`,
  ];
  if (stats.top) {
    parts.push(`highest ${c.red}${formatPercent(stats.top.overlap)}${c.reset} (${stats.top.left} ↔ ${stats.top.right})`);
  }
  return parts.join(", ");
}
