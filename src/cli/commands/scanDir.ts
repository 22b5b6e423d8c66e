import fs from "node:fs";
import path from "node:path";
import { FileReadError, errorMessage } from "../../core/errors.js";
import { normalizeExtension } from "../../util/hex.js";
import { writeJsonReport } from "../../validator/report/json.js";
import { printOutcome, printScanSummary } from "../../validator/report/printer.js";
import type { ScanEntry, ScanReport, ValidationOutcome } from "../../validator/report/types.js";
import { ensureSignatures, type CliContext } from "../context.js";
import { ExitCode } from "../exitCodes.js";

export type ScanDirOptions = {
  recursive?: boolean;
  verbose?: boolean;
  extensions?: string[];
  report?: string;
};

/** Regular files under `dir`, sorted; subdirectories only when recursive. */
export function collectFiles(dir: string, recursive: boolean): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new FileReadError(
      `Cannot read directory '${dir}': ${errorMessage(err)}`,
      dir
    );
  }

  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isFile()) files.push(full);
    else if (recursive && entry.isDirectory()) files.push(...collectFiles(full, true));
  }
  return files.sort();
}

function toEntry(outcome: ValidationOutcome): ScanEntry {
  switch (outcome.status) {
    case "valid":
      return { file: outcome.filePath, status: "valid" };
    case "invalid":
      return { file: outcome.filePath, status: "invalid", message: outcome.message };
    case "fault":
      return {
        file: outcome.filePath,
        status: outcome.kind === "signature-not-found" ? "unknown" : "error",
        message: outcome.error.message,
      };
  }
}

export async function runScanDir(
  ctx: CliContext,
  dir: string,
  opts: ScanDirOptions = {}
): Promise<ExitCode> {
  const started = Date.now();
  ensureSignatures(ctx);

  const wanted = new Set((opts.extensions ?? []).map(normalizeExtension));
  let files = collectFiles(dir, !!opts.recursive);
  if (wanted.size > 0) {
    files = files.filter((f) => wanted.has(normalizeExtension(path.extname(f))));
  }

  if (files.length === 0) {
    ctx.out.log(`No files found in ${dir}`);
    return ExitCode.Ok;
  }
  ctx.out.log(`Scanning ${files.length} files...`);

  const entries: ScanEntry[] = [];
  for (const file of files) {
    const outcome = ctx.validator.inspect(file);
    if (outcome.status !== "valid" || opts.verbose) {
      printOutcome(ctx.out, outcome);
    }
    entries.push(toEntry(outcome));
  }

  const valid = entries.filter((e) => e.status === "valid").length;
  const errors = entries.filter((e) => e.status === "error").length;
  const invalid = entries.length - valid - errors;
  const finished = Date.now();

  const report: ScanReport = {
    directory: dir,
    recursive: !!opts.recursive,
    extensions: [...wanted].sort(),
    dbPath: ctx.store.dbPath,
    total: entries.length,
    valid,
    invalid,
    errors,
    files: entries,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started,
    pass: invalid === 0 && errors === 0,
  };

  printScanSummary(ctx.out, report);

  if (opts.report) {
    await writeJsonReport(opts.report, report);
    ctx.out.log(`Report written: ${opts.report}`);
  }

  if (errors > 0) return ExitCode.Error;
  return invalid > 0 ? ExitCode.Invalid : ExitCode.Ok;
}
