/**
 * Configuration constants for scoring and report generation.
 * Centralizes magic numbers for easier tuning and documentation.
 */

/**
 * Report rendering defaults
 */
export const REPORT_CONFIG = {
  /** Tokens per highlighted chunk in pairwise reports */
  DEFAULT_BLOCK_SIZE: 2,
  /** Fixed file name of the summary table inside the output directory */
  SUMMARY_FILENAME: "_results.html",
  /** Pairwise report file extension */
  REPORT_EXTENSION: ".html",
  /** Decimal places for percentages in the summary table */
  PERCENT_DECIMALS: 2,
} as const;

/**
 * Existence polling for the summary file
 */
export const POLL_CONFIG = {
  /** Give up after this long (ms) */
  TIMEOUT_MS: 60_000,
  /** Delay between existence checks (ms) */
  INTERVAL_MS: 100,
} as const;

/**
 * Source document storage
 */
export const STORE_CONFIG = {
  /** Default directory holding the documents under comparison */
  INPUT_DIR: "input_files",
  /** Root for timestamped result directories when no output dir is given */
  RESULTS_ROOT: "results",
  /** Extensions accepted for comparison (lower-case, no dot) */
  ALLOWED_EXTENSIONS: ["txt", "pdf", "docx", "odt"],
} as const;

/**
 * Type representing the side of a pairwise report (left = row document)
 */
export type Side = "left" | "right";
