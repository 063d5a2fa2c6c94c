/**
 * Public API: scoring, pairwise rendering and comparison runs.
 */

export { score, overlapScore, compareSequences, type OverlapResult } from "./core/similarity.js";
export { findLongestMatch, getMatchingBlocks, type MatchingBlock } from "./core/sequence-matcher.js";
export {
  runFullComparison,
  runTargetedComparison,
  compareAll,
  compareTarget,
  documentName,
  type Document,
  type RunOptions,
  type ComparisonRun,
  type PairFailure,
} from "./core/matrix.js";
export { renderPairFragment, writePairReport, type PairFragment } from "./render/pair-report.js";
export { assembleSummary, addLinksToTable, renderSummaryTable, waitForFile, type SummaryTable } from "./report/summary.js";
export { createDefaultRegistry, ExtractorRegistry, type Extractor } from "./extract/index.js";
export { listFiles, storeFile, deleteFiles, formatSize, type StoredFile } from "./store/file-store.js";
export { tokenize } from "./text/tokens.js";
export * from "./errors.js";
