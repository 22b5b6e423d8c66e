import { SignatureNotFoundError } from "../../core/errors.js";
import { exportSignatures } from "../../signatures/exporter.js";
import { loadSignatures } from "../../signatures/loader.js";
import { printSignatures } from "../../validator/report/printer.js";
import { ensureSignatures, type CliContext } from "../context.js";
import { ExitCode } from "../exitCodes.js";

export const CATEGORIES: ReadonlyArray<[string, readonly string[]]> = [
  ["Documents", ["pdf", "docx", "xlsx", "pptx", "xml", "rtf"]],
  ["Images", ["jpg", "jpeg", "png", "gif", "bmp", "ico", "webp", "tif", "tiff"]],
  ["Archives", ["zip", "rar", "7z", "tar", "gz", "bz2", "xz"]],
  ["Executables", ["exe", "dll", "elf", "class", "wasm"]],
  ["Media", ["mp3", "mp4", "avi", "mkv", "wav", "flac", "ogg"]],
  ["Databases", ["sqlite", "db"]],
];

/** Registered extensions grouped by category; unlisted ones land in "Other". */
export function groupExtensions(extensions: string[]): [string, string[]][] {
  const known = new Set(CATEGORIES.flatMap(([, exts]) => exts));
  const groups: [string, string[]][] = [];
  for (const [name, exts] of CATEGORIES) {
    const matching = extensions.filter((e) => exts.includes(e)).sort();
    if (matching.length > 0) groups.push([name, matching]);
  }
  const other = extensions.filter((e) => !known.has(e)).sort();
  if (other.length > 0) groups.push(["Other", other]);
  return groups;
}

export function runList(ctx: CliContext): ExitCode {
  ensureSignatures(ctx);
  const extensions = ctx.store.allExtensions();
  if (extensions.length === 0) {
    ctx.out.log("No signatures loaded");
    return ExitCode.Ok;
  }

  ctx.out.log(`Supported file types (${extensions.length}):`);
  for (const [category, exts] of groupExtensions(extensions)) {
    ctx.out.log("");
    ctx.out.log(`${category}:`);
    for (const ext of exts) {
      const n = ctx.store.getSignatures(ext).length;
      ctx.out.log(`  .${ext} (${n} signature${n === 1 ? "" : "s"})`);
    }
  }
  return ExitCode.Ok;
}

export function runShow(ctx: CliContext, extension: string): ExitCode {
  ensureSignatures(ctx);
  try {
    const records = ctx.store.getSignatureRecords(extension);
    printSignatures(ctx.out, records[0].extension, records);
    return ExitCode.Ok;
  } catch (err) {
    if (!(err instanceof SignatureNotFoundError)) throw err;
    ctx.out.error(`Unknown file type: ${err.message}`);
    return ExitCode.UnknownType;
  }
}

export type AddOptions = {
  offset?: number;
  description?: string;
  mime?: string;
};

export function runAdd(
  ctx: CliContext,
  extension: string,
  magicBytes: string,
  opts: AddOptions = {}
): ExitCode {
  const rec = ctx.store.addSignature({
    extension,
    magicBytes,
    offset: opts.offset ?? 0,
    description: opts.description,
    mimeType: opts.mime,
  });
  ctx.out.log(
    `Added signature for .${rec.extension}: ${rec.magicBytes} at offset ${rec.offset}`
  );
  return ExitCode.Ok;
}

export function runImport(ctx: CliContext, file: string): ExitCode {
  const { loaded, skipped } = loadSignatures(file, ctx.store, ctx.log);
  ctx.out.log(`Loaded ${loaded} signatures, skipped ${skipped} duplicates`);
  return ExitCode.Ok;
}

export function runExport(ctx: CliContext, file: string): ExitCode {
  const count = exportSignatures(ctx.store, file, ctx.log);
  ctx.out.log(`Exported ${count} signatures to ${file}`);
  return ExitCode.Ok;
}
