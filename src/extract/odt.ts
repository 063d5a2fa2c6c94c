/**
 * OpenDocument text (.odt): the body of content.xml inside the archive.
 */
import { readFile } from "node:fs/promises";
import JSZip from "jszip";
import { decodeXmlEntities } from "../text/html.js";
import type { Extractor } from "./registry.js";

/** Elements that separate words in ODF text */
const BREAK_ELEMENTS = /<text:(?:s|tab|line-break)\b[^>]*\/>|<\/text:(?:p|h)>/g;
const ANY_TAG = /<[^>]+>/g;

/**
 * Plain text of an ODF content.xml body. Inline spans are dropped without
 * inserting whitespace so styled runs inside a word stay one word.
 */
export function odfXmlToText(xml: string): string {
  return decodeXmlEntities(xml.replace(BREAK_ELEMENTS, " ").replace(ANY_TAG, ""));
}

export async function extractOdtText(path: string): Promise<string> {
  const zip = await JSZip.loadAsync(await readFile(path));
  const content = zip.file("content.xml");
  if (!content) {
    throw new Error("content.xml missing from archive");
  }
  return odfXmlToText(await content.async("string"));
}

export const odtExtractor: Extractor = {
  extensions: ["odt"],
  extractText: extractOdtText,
};
