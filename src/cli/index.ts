#!/usr/bin/env node

/**
 * CLI entry point using commander.js.
 * Wires together modular components from src/cli/*.
 */

import { program, Option } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { runFullComparison, runTargetedComparison, type RunOptions } from "../core/matrix.js";
import { STORE_CONFIG, REPORT_CONFIG } from "../config.js";
import { setDebugEnabled, setVerboseEnabled, verbose } from "../debug.js";
import { ConfigurationError, PathNotFoundError, errorMessage, isOverlapError } from "../errors.js";
import { deleteFiles, listFiles, listSources, storeFile } from "../store/file-store.js";
import { isThemeName } from "../ui/themes.js";
import { c, logError, logInfo, logSuccess } from "./colors.js";
import { openInBrowser, renderFileList, reportRun, type OutputOptions } from "./output.js";

// ─── Version ─────────────────────────────────────────────────────────────────

function getVersion(): string {
  try {
    const pkgPath = new URL("../../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

const VERSION = getVersion();

// ─── Option Parsing ──────────────────────────────────────────────────────────

type GlobalOptions = {
  out?: string;
  blockSize: string;
  theme: string;
  concurrency?: string;
  quiet?: boolean;
  open: boolean;
  verbose?: boolean;
  debug?: boolean;
};

function parsePositiveInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer, got "${value}"`);
  }
  return n;
}

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function buildRunOptions(opts: GlobalOptions): RunOptions {
  if (!isThemeName(opts.theme)) {
    throw new ConfigurationError(`Unknown theme "${opts.theme}"`);
  }
  return {
    outputDir: opts.out,
    blockSize: parsePositiveInt(opts.blockSize, "Block size"),
    theme: opts.theme,
    concurrency: opts.concurrency === undefined ? undefined : parsePositiveInt(opts.concurrency, "Concurrency"),
  };
}

function outputOptions(opts: GlobalOptions): OutputOptions {
  return { quiet: Boolean(opts.quiet), noOpen: !opts.open };
}

function applyLogFlags(opts: GlobalOptions): void {
  if (opts.verbose) setVerboseEnabled(true);
  if (opts.debug) setDebugEnabled(true);
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function runCompare(dir: string): Promise<void> {
  const opts = globalOptions();
  applyLogFlags(opts);
  const runOptions = buildRunOptions(opts);
  const out = outputOptions(opts);

  const sources = await listSources(dir);
  verbose(`Comparing ${sources.length} file(s) in ${dir}...`);

  const run = await runFullComparison(sources, runOptions);
  reportRun(run, out);
  if (!out.noOpen) await openInBrowser(run.summaryPath);
}

async function runCheck(file: string, dir: string): Promise<void> {
  const opts = globalOptions();
  applyLogFlags(opts);
  const runOptions = buildRunOptions(opts);
  const out = outputOptions(opts);

  const target = resolve(file);
  if (!existsSync(target)) {
    throw new PathNotFoundError(file, "input file");
  }
  const candidates = (await listSources(dir)).filter((path) => resolve(path) !== target);
  verbose(`Comparing ${file} against ${candidates.length} file(s) in ${dir}...`);

  const run = await runTargetedComparison(target, candidates, runOptions);
  reportRun(run, out);
  if (!out.noOpen) await openInBrowser(run.summaryPath);
}

async function runAdd(file: string, dir: string): Promise<void> {
  const stored = await storeFile(file, dir);
  if (!globalOptions().quiet) logSuccess(`File '${file}' stored as ${stored}`);
  await runCheck(stored, dir);
}

async function runList(dir: string): Promise<void> {
  const files = await listFiles(dir);
  console.log(renderFileList(files));
}

async function runRemove(ids: string[], dir: string): Promise<void> {
  const serials = ids.map((id) => parsePositiveInt(id, "File id"));
  const result = await deleteFiles(dir, serials);
  logInfo(result.message);
}

// ─── Command Setup ───────────────────────────────────────────────────────────

program
  .name("doc-overlap")
  .description("Pairwise document overlap with side-by-side HTML reports")
  .version(VERSION, "-v, --version")
  .option("-o, --out <dir>", "Write reports to this directory (default: results/<timestamp>)")
  .option("-b, --block-size <n>", "Tokens per highlighted chunk", String(REPORT_CONFIG.DEFAULT_BLOCK_SIZE))
  .addOption(new Option("-t, --theme <name>", "Report theme").choices(["dark", "solar"]).default("dark"))
  .option("-j, --concurrency <n>", "Pairs processed at once (default: CPU count)")
  .option("-q, --quiet", "Suppress non-essential output")
  .option("--no-open", "Don't auto-open the summary in a browser")
  .option("--verbose", "Show timing info for each stage")
  .option("--debug", "Enable granular debug output");

program
  .command("compare")
  .description("Compare every pair of documents in a directory")
  .argument("[dir]", "Directory of txt, pdf, docx and odt files", STORE_CONFIG.INPUT_DIR)
  .action(runCompare);

program
  .command("check")
  .description("Compare one document against the documents in a directory")
  .argument("<file>", "Document to check")
  .argument("[dir]", "Directory of candidate documents", STORE_CONFIG.INPUT_DIR)
  .action(runCheck);

program
  .command("add")
  .description("Store a document, then check it against the stored documents")
  .argument("<file>", "Document to add")
  .argument("[dir]", "Store directory", STORE_CONFIG.INPUT_DIR)
  .action(runAdd);

program
  .command("list")
  .description("List stored documents with their ids")
  .argument("[dir]", "Store directory", STORE_CONFIG.INPUT_DIR)
  .action(runList);

program
  .command("remove")
  .description("Delete stored documents by id (as shown by list)")
  .argument("<ids...>", "1-based file ids")
  .option("-d, --dir <dir>", "Store directory", STORE_CONFIG.INPUT_DIR)
  .action((ids: string[], cmdOpts: { dir: string }) => runRemove(ids, cmdOpts.dir));

program.addHelpText(
  "after",
  `
${c.bold}Examples${c.reset}
  ${c.dim}# Compare all documents in ./input_files${c.reset}
  doc-overlap compare

  ${c.dim}# Larger highlight chunks, reports in ./out${c.reset}
  doc-overlap -b 5 -o out compare papers/

  ${c.dim}# Check a new submission against the store${c.reset}
  doc-overlap add essay.docx
`,
);

// ─── Main ────────────────────────────────────────────────────────────────────

async function main() {
  await program.parseAsync();
}

main().catch((err: unknown) => {
  if (isOverlapError(err)) {
    logError(err.message, err.hint);
  } else {
    logError(errorMessage(err));
  }
  process.exit(1);
});
