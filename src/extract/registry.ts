/**
 * Text extraction capability, dispatched by file extension.
 */
import { existsSync } from "node:fs";
import { extname } from "node:path";
import { PathNotFoundError, UnsupportedFormatError } from "../errors.js";
import { tokenize } from "../text/tokens.js";

export interface Extractor {
  /** Lower-case extensions without the dot, e.g. ["txt"] */
  readonly extensions: readonly string[];
  /** Extract the raw text of a file */
  extractText(path: string): Promise<string>;
}

/** Lower-case extension of a path without the dot ("" when there is none) */
export function extensionOf(path: string): string {
  return extname(path).slice(1).toLowerCase();
}

export class ExtractorRegistry {
  private readonly byExtension = new Map<string, Extractor>();

  constructor(
    extractors: readonly Extractor[] = [],
    private readonly tokenizer: (text: string) => string[] = tokenize,
  ) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  /** Later registrations replace earlier ones for the same extension */
  register(extractor: Extractor): this {
    for (const ext of extractor.extensions) {
      this.byExtension.set(ext.toLowerCase(), extractor);
    }
    return this;
  }

  supports(path: string): boolean {
    return this.byExtension.has(extensionOf(path));
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  /**
   * Extract the token sequence of a file.
   * A file with no words counts as a failed extraction.
   */
  async extract(path: string): Promise<string[]> {
    const extractor = this.byExtension.get(extensionOf(path));
    if (!extractor) {
      throw new UnsupportedFormatError(path);
    }
    if (!existsSync(path)) {
      throw new PathNotFoundError(path, "file");
    }

    let text: string;
    try {
      text = await extractor.extractText(path);
    } catch (err) {
      throw new UnsupportedFormatError(path, err instanceof Error ? err.message : String(err));
    }

    const tokens = this.tokenizer(text);
    if (tokens.length === 0) {
      throw new UnsupportedFormatError(path, "no text found");
    }
    return tokens;
  }
}
