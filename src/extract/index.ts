import { ExtractorRegistry } from "./registry.js";
import { plainTextExtractor } from "./plain-text.js";
import { pdfExtractor } from "./pdf.js";
import { docxExtractor } from "./docx.js";
import { odtExtractor } from "./odt.js";

export { ExtractorRegistry, extensionOf, type Extractor } from "./registry.js";

/**
 * Registry with every supported format: txt, pdf, docx, odt.
 */
export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([plainTextExtractor, pdfExtractor, docxExtractor, odtExtractor]);
}
