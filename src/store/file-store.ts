/**
 * Local store for the documents under comparison.
 * Files are addressed by 1-based serial numbers over the sorted listing.
 */
import { existsSync } from "node:fs";
import { copyFile, mkdir, readdir, stat, unlink } from "node:fs/promises";
import { basename, join } from "node:path";
import { STORE_CONFIG } from "../config.js";
import { PathNotFoundError, UnsupportedFormatError } from "../errors.js";
import { extensionOf } from "../extract/registry.js";
import { compareCodeUnits } from "../text/tokens.js";

export interface StoredFile {
  /** 1-based position in the sorted listing */
  id: number;
  fileName: string;
  /** Upper-case extension without the dot, e.g. "PDF" */
  extension: string;
  /** Size in bytes */
  size: number;
  path: string;
}

export interface DeleteResult {
  deleted: number;
  notFound: number;
  message: string;
}

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable size: 512 → "512 B", 1536 → "1.5 KB".
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  const value = unit === 0 ? size.toString() : size.toFixed(1).replace(/\.0$/, "");
  return `${value} ${SIZE_UNITS[unit]}`;
}

export function isAllowedFile(path: string): boolean {
  const ext = extensionOf(path);
  return STORE_CONFIG.ALLOWED_EXTENSIONS.some((allowed) => allowed === ext);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? "s" : ""}`;
}

async function sortedFileNames(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort(compareCodeUnits);
}

/**
 * Paths of the comparable documents in a directory, sorted by file name.
 */
export async function listSources(dir: string): Promise<string[]> {
  if (!existsSync(dir)) {
    throw new PathNotFoundError(dir, "directory");
  }
  return (await sortedFileNames(dir)).filter(isAllowedFile).map((name) => join(dir, name));
}

/**
 * List every file in the store. The directory is created when missing.
 */
export async function listFiles(dir: string = STORE_CONFIG.INPUT_DIR): Promise<StoredFile[]> {
  await mkdir(dir, { recursive: true });
  const names = await sortedFileNames(dir);
  return Promise.all(
    names.map(async (fileName, i) => {
      const path = join(dir, fileName);
      const info = await stat(path);
      return {
        id: i + 1,
        fileName,
        extension: extensionOf(fileName).toUpperCase(),
        size: info.size,
        path,
      };
    }),
  );
}

/**
 * Copy a document into the store.
 * @returns Path of the stored copy
 */
export async function storeFile(sourcePath: string, dir: string = STORE_CONFIG.INPUT_DIR): Promise<string> {
  if (!isAllowedFile(sourcePath)) {
    throw new UnsupportedFormatError(sourcePath);
  }
  if (!existsSync(sourcePath)) {
    throw new PathNotFoundError(sourcePath, "file");
  }
  await mkdir(dir, { recursive: true });
  const target = join(dir, basename(sourcePath));
  await copyFile(sourcePath, target);
  return target;
}

/**
 * Delete files by serial number. Numbers outside the listing count as not found.
 */
export async function deleteFiles(
  dir: string,
  serialNumbers: readonly number[],
): Promise<DeleteResult> {
  if (!existsSync(dir)) {
    throw new PathNotFoundError(dir, "directory");
  }

  const names = await sortedFileNames(dir);
  let deleted = 0;
  let notFound = 0;

  for (const serial of serialNumbers) {
    const name = Number.isInteger(serial) ? names[serial - 1] : undefined;
    const path = name === undefined ? undefined : join(dir, name);
    if (path === undefined || !existsSync(path)) {
      notFound++;
      continue;
    }
    await unlink(path);
    deleted++;
  }

  const parts: string[] = [];
  if (deleted > 0) parts.push(`${plural(deleted, "file")} successfully deleted`);
  if (notFound > 0) parts.push(`${plural(notFound, "file")} not found`);

  return { deleted, notFound, message: parts.join(", ") };
}
