/**
 * Error taxonomy for comparison runs.
 *
 * Structural problems (missing paths, too few documents, bad configuration)
 * are thrown before any work starts. ReportNotPersistedError is thrown after
 * scoring and rendering have completed.
 */

export type ErrorCode =
  | "PATH_NOT_FOUND"
  | "MINIMUM_DOCUMENTS"
  | "NO_CANDIDATES"
  | "UNSUPPORTED_FORMAT"
  | "CONFIGURATION_ERROR"
  | "REPORT_NOT_PERSISTED";

export class OverlapError extends Error {
  readonly code: ErrorCode;
  /** Optional remediation shown by the CLI */
  readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.hint = hint;
  }
}

export class PathNotFoundError extends OverlapError {
  readonly path: string;

  constructor(path: string, what = "path") {
    super("PATH_NOT_FOUND", `The specified ${what} does not exist: ${path}`);
    this.path = path;
  }
}

export class MinimumDocumentsError extends OverlapError {
  constructor(count: number) {
    super(
      "MINIMUM_DOCUMENTS",
      `At least two documents are required for comparison, found ${count}`,
      "Add more txt, pdf, docx or odt files to the input directory",
    );
  }
}

export class NoCandidatesError extends OverlapError {
  constructor(target: string) {
    super("NO_CANDIDATES", `No comparable documents left to compare against ${target}`);
  }
}

export class UnsupportedFormatError extends OverlapError {
  readonly path: string;

  constructor(path: string, reason?: string) {
    super(
      "UNSUPPORTED_FORMAT",
      reason ? `Cannot extract text from ${path}: ${reason}` : `Unsupported file format: ${path}`,
      "Supported formats: txt, pdf, docx, odt",
    );
    this.path = path;
  }
}

export class ConfigurationError extends OverlapError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class ReportNotPersistedError extends OverlapError {
  readonly path: string;

  constructor(path: string, timeoutMs: number) {
    super("REPORT_NOT_PERSISTED", `Results file was not created within ${timeoutMs}ms: ${path}`);
    this.path = path;
  }
}

export function isOverlapError(err: unknown): err is OverlapError {
  return err instanceof OverlapError;
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
