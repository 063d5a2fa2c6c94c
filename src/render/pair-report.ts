/**
 * Pairwise report rendering.
 * Produces the side-by-side HTML for one ordered document pair and writes it
 * to its own file inside the run's output directory.
 */
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { MatchingBlock } from "../core/sequence-matcher.js";
import { REPORT_CONFIG } from "../config.js";
import { escapeHtml } from "../text/html.js";
import { generatePairHtml } from "../ui/template.js";
import type { ThemeName } from "../ui/themes.js";
import { chunkSpans, toSpans, validateBlockSize, type Span } from "./spans.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("pair-report");

export interface PairFragment {
  leftHtml: string;
  rightHtml: string;
}

export interface PairReportInput {
  /** Row document tokens, shown on the left */
  left: readonly string[];
  /** Column document tokens, shown on the right */
  right: readonly string[];
  blocks: readonly MatchingBlock[];
  names: readonly [string, string];
  overlap: number;
}

/** Render chunks as highlighted spans, in token order */
function renderChunks(chunks: Span[]): string {
  return chunks
    .map((chunk) => `<span class="chunk ${chunk.kind}">${escapeHtml(chunk.tokens.join(" "))}</span>`)
    .join(" ");
}

/**
 * Render both sides of a pair. Matched and unmatched runs are split into
 * chunks of at most blockSize tokens before being wrapped in markup.
 */
export function renderPairFragment(
  left: readonly string[],
  right: readonly string[],
  blocks: readonly MatchingBlock[],
  blockSize: number,
): PairFragment {
  validateBlockSize(blockSize);
  return {
    leftHtml: renderChunks(chunkSpans(toSpans(left, blocks, "left"), blockSize)),
    rightHtml: renderChunks(chunkSpans(toSpans(right, blocks, "right"), blockSize)),
  };
}

/** File name of the report for a given pair index */
export function reportFileName(pairIndex: number): string {
  return `${pairIndex}${REPORT_CONFIG.REPORT_EXTENSION}`;
}

/**
 * Render a pair and write it as <pairIndex>.html under outputDir.
 * Returns the file name, relative to outputDir.
 */
export async function writePairReport(
  outputDir: string,
  pairIndex: number,
  input: PairReportInput,
  blockSize: number,
  theme: ThemeName = "dark",
): Promise<string> {
  const fragment = renderPairFragment(input.left, input.right, input.blocks, blockSize);
  const html = generatePairHtml(
    {
      leftTitle: input.names[0],
      rightTitle: input.names[1],
      leftHtml: fragment.leftHtml,
      rightHtml: fragment.rightHtml,
      overlap: input.overlap,
    },
    theme,
  );

  const fileName = reportFileName(pairIndex);
  await writeFile(join(outputDir, fileName), html, "utf-8");
  debug("wrote", fileName, `${input.names[0]} → ${input.names[1]}`);
  return fileName;
}
