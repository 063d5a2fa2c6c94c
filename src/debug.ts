/**
 * Shared debug and verbose logging utility.
 * Enable with --debug / --verbose flags or by setting
 * globalThis.__DOC_OVERLAP_DEBUG__ / __DOC_OVERLAP_VERBOSE__ = true
 */

const DEBUG_FLAG = "__DOC_OVERLAP_DEBUG__";
const VERBOSE_FLAG = "__DOC_OVERLAP_VERBOSE__";

function readFlag(flag: string): boolean {
  return Boolean((globalThis as Record<string, unknown>)[flag]);
}

/**
 * Check if debug mode is enabled.
 */
export function isDebugEnabled(): boolean {
  return readFlag(DEBUG_FLAG);
}

/**
 * Check if verbose mode is enabled (debug implies verbose).
 */
export function isVerboseEnabled(): boolean {
  return readFlag(VERBOSE_FLAG) || isDebugEnabled();
}

export function setDebugEnabled(enabled: boolean): void {
  (globalThis as Record<string, unknown>)[DEBUG_FLAG] = enabled;
}

export function setVerboseEnabled(enabled: boolean): void {
  (globalThis as Record<string, unknown>)[VERBOSE_FLAG] = enabled;
}

/**
 * Create a debug logger with an optional module prefix.
 * @param prefix Optional prefix to identify the module (e.g., "matrix")
 */
export function createDebugLogger(prefix?: string) {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  return (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.log(tag, ...args);
    }
  };
}

/**
 * Progress output shown with --verbose.
 */
export function verbose(...args: unknown[]): void {
  if (isVerboseEnabled()) {
    console.log(...args);
  }
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Format duration in milliseconds to a readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Time an async function and log the result in verbose mode.
 * @param label Label for the timing output
 * @param prefix Optional prefix for the log (module name)
 */
export async function timeAsync<T>(label: string, fn: () => Promise<T>, prefix?: string): Promise<T> {
  if (!isVerboseEnabled()) {
    return fn();
  }

  const tag = prefix ? `[${prefix}]` : "[time]";
  const start = performance.now();
  const startTime = new Date();

  try {
    const result = await fn();
    const elapsed = performance.now() - start;
    console.log(`${tag} ${formatTimestamp(startTime)} ${label}: ${formatDuration(elapsed)}`);
    return result;
  } catch (err) {
    const elapsed = performance.now() - start;
    console.log(`${tag} ${formatTimestamp(startTime)} ${label}: FAILED after ${formatDuration(elapsed)}`);
    throw err;
  }
}

/**
 * Create a scoped timer for measuring the stages of a run.
 * @param prefix Optional module prefix for all logs
 */
export function createTimer(prefix?: string) {
  const tag = prefix ? `[${prefix}]` : "[time]";
  const overallStart = performance.now();

  return {
    timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
      return timeAsync(label, fn, prefix);
    },

    /**
     * Log total elapsed time.
     */
    done(label = "Total"): void {
      if (isVerboseEnabled()) {
        const elapsed = performance.now() - overallStart;
        console.log(`${tag} ${formatTimestamp(new Date())} ${label}: ${formatDuration(elapsed)}`);
      }
    },
  };
}
