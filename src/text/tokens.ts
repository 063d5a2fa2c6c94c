/**
 * Word tokenization for document comparison.
 * Tokens are whitespace-separated words, compared exactly.
 */

/**
 * Split text into words on runs of whitespace.
 */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/**
 * Locale-independent string order (UTF-16 code units), as Array.prototype.sort
 * uses by default.
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
