import { readFile } from "node:fs/promises";
import type { Extractor } from "./registry.js";

export const plainTextExtractor: Extractor = {
  extensions: ["txt"],
  extractText: (path) => readFile(path, "utf-8"),
};
