/**
 * Span computation for pairwise reports.
 * Turns a block decomposition into matched/unmatched runs for each side,
 * then groups the runs into fixed-size chunks for highlighting.
 */
import type { MatchingBlock } from "../core/sequence-matcher.js";
import type { Side } from "../config.js";
import { ConfigurationError } from "../errors.js";

export type SpanKind = "matched" | "unmatched";

export interface Span {
  kind: SpanKind;
  /** Start token index on this side */
  start: number;
  tokens: string[];
}

/**
 * Check a chunk size before any rendering happens.
 */
export function validateBlockSize(blockSize: number): void {
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new ConfigurationError(`Block size must be a positive integer, got ${blockSize}`);
  }
}

/**
 * Walk the decomposition and emit spans covering every token of one side,
 * in token order. The gaps between blocks are the unmatched spans.
 */
export function toSpans(tokens: readonly string[], blocks: readonly MatchingBlock[], side: Side): Span[] {
  const spans: Span[] = [];
  let cursor = 0;

  for (const block of blocks) {
    const start = side === "left" ? block.aStart : block.bStart;
    if (start > cursor) {
      spans.push({ kind: "unmatched", start: cursor, tokens: tokens.slice(cursor, start) });
    }
    if (block.length > 0) {
      spans.push({ kind: "matched", start, tokens: tokens.slice(start, start + block.length) });
    }
    cursor = Math.max(cursor, start + block.length);
  }

  if (cursor < tokens.length) {
    spans.push({ kind: "unmatched", start: cursor, tokens: tokens.slice(cursor) });
  }

  return spans;
}

/**
 * Split every span into chunks of at most blockSize tokens.
 */
export function chunkSpans(spans: readonly Span[], blockSize: number): Span[] {
  validateBlockSize(blockSize);

  const chunks: Span[] = [];
  for (const span of spans) {
    for (let offset = 0; offset < span.tokens.length; offset += blockSize) {
      chunks.push({
        kind: span.kind,
        start: span.start + offset,
        tokens: span.tokens.slice(offset, offset + blockSize),
      });
    }
  }
  return chunks;
}
