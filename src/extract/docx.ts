/**
 * Word (.docx) text through mammoth's raw-text conversion.
 */
import mammoth from "mammoth";
import type { Extractor } from "./registry.js";

export async function extractDocxText(path: string): Promise<string> {
  const result = await mammoth.extractRawText({ path });
  return result.value;
}

export const docxExtractor: Extractor = {
  extensions: ["docx"],
  extractText: extractDocxText,
};
