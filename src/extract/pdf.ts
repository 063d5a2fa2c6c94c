/**
 * PDF text through pdfjs, loaded on first use.
 */
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import type { Extractor } from "./registry.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("pdf");

type PdfJs = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

let pdfjs: Promise<PdfJs> | undefined;

/** Load pdfjs on first use and point it at its worker script */
function loadPdfJs(): Promise<PdfJs> {
  pdfjs ??= import("pdfjs-dist/legacy/build/pdf.mjs").then((mod) => {
    try {
      const workerPath = createRequire(import.meta.url).resolve("pdfjs-dist/legacy/build/pdf.worker.mjs");
      if (existsSync(workerPath)) {
        mod.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
      }
    } catch (err) {
      debug("worker script not resolved, using the built-in fake worker:", err);
    }
    return mod;
  });
  return pdfjs;
}

/**
 * Concatenate the text items of every page, one line per page.
 */
export async function extractPdfText(path: string): Promise<string> {
  const { getDocument } = await loadPdfJs();
  const data = new Uint8Array(await readFile(path));
  const pdf = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const words: string[] = [];
      for (const item of content.items) {
        if ("str" in item && item.str) {
          words.push(item.str);
        }
      }
      pages.push(words.join(" "));
      page.cleanup();
    }
    return pages.join("\n");
  } finally {
    await pdf.destroy();
  }
}

export const pdfExtractor: Extractor = {
  extensions: ["pdf"],
  extractText: extractPdfText,
};
