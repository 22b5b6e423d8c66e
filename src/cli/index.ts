#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError, Option } from "commander";
import { ZodError } from "zod";
import { BytewardenError, errorMessage } from "../core/errors.js";
import { LOG_LEVELS, loadConfig, type AppConfig } from "../util/config.js";
import { createLogger, pruneLogFiles } from "../util/logger.js";
import { consoleOutput } from "../validator/report/printer.js";
import { runScan, type ScanOptions } from "./commands/scan.js";
import { runScanDir, type ScanDirOptions } from "./commands/scanDir.js";
import {
  runAdd,
  runExport,
  runImport,
  runList,
  runShow,
  type AddOptions,
} from "./commands/signatures.js";
import { runStatus, type StatusOptions } from "./commands/status.js";
import { openContext, type CliContext } from "./context.js";
import { ExitCode } from "./exitCodes.js";

const VERSION = "0.1.0";
const KEEP_LOG_DAYS = 30;

type GlobalOptions = {
  db?: string;
  logLevel?: string;
};

function resolveConfig(globals: GlobalOptions): AppConfig {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (globals.db) env.BYTEWARDEN_DB_PATH = globals.db;
  if (globals.logLevel) env.BYTEWARDEN_LOG_LEVEL = globals.logLevel;
  return loadConfig(env);
}

async function withContext(
  cmd: Command,
  run: (ctx: CliContext) => ExitCode | Promise<ExitCode>
): Promise<void> {
  let config: AppConfig;
  try {
    config = resolveConfig(cmd.optsWithGlobals<GlobalOptions>());
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        console.error(`Config error: ${issue.path.join(".")}: ${issue.message}`);
      }
      process.exit(ExitCode.Error);
    }
    throw err;
  }

  pruneLogFiles(config.logDir, KEEP_LOG_DAYS);
  const log = createLogger({ level: config.logLevel, logDir: config.logDir });

  let code: ExitCode = ExitCode.Error;
  let ctx: CliContext | undefined;
  try {
    ctx = openContext(config, log, consoleOutput);
    code = await run(ctx);
  } catch (err) {
    consoleOutput.error(`Error: ${errorMessage(err)}`);
    if (!(err instanceof BytewardenError)) log.error({ err }, "unexpected error");
  } finally {
    ctx?.validator.close();
  }
  process.exit(code);
}

function parseOffset(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Offset must be a non-negative integer.");
  }
  return n;
}

const program = new Command();

program
  .name("bytewarden")
  .description(
    "Detects file type spoofing by checking magic bytes against the file extension"
  )
  .version(VERSION)
  .option("--db <path>", "Signature database path (overrides BYTEWARDEN_DB_PATH)")
  .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS));

program
  .command("scan")
  .description("Validate that a file's content matches its extension")
  .argument("<file>", "file to validate")
  .option("-v, --verbose", "Verbose output")
  .option("--hash", "Also print the file's SHA-256")
  .action((file: string, opts: ScanOptions, cmd: Command) =>
    withContext(cmd, (ctx) => runScan(ctx, file, opts))
  );

program
  .command("scan-dir")
  .description("Validate every file in a directory")
  .argument("<dir>", "directory to scan")
  .option("-r, --recursive", "Scan subdirectories")
  .option("-v, --verbose", "Also list valid files")
  .option("-e, --extensions <ext...>", "Only scan files with these extensions")
  .option("--report <file>", "Write a JSON report")
  .action((dir: string, opts: ScanDirOptions, cmd: Command) =>
    withContext(cmd, (ctx) => runScanDir(ctx, dir, opts))
  );

program
  .command("list")
  .description("List supported file types")
  .action((_opts: unknown, cmd: Command) => withContext(cmd, (ctx) => runList(ctx)));

program
  .command("show")
  .description("Show the signatures registered for an extension")
  .argument("<ext>", "file extension, e.g. pdf")
  .action((ext: string, _opts: unknown, cmd: Command) =>
    withContext(cmd, (ctx) => runShow(ctx, ext))
  );

program
  .command("add")
  .description("Register a signature")
  .argument("<ext>", "file extension")
  .argument("<hex>", "magic bytes as hex, e.g. 25504446")
  .option("--offset <n>", "Byte offset of the magic bytes", parseOffset, 0)
  .option("--description <text>", "Description")
  .option("--mime <type>", "MIME type")
  .action((ext: string, hex: string, opts: AddOptions, cmd: Command) =>
    withContext(cmd, (ctx) => runAdd(ctx, ext, hex, opts))
  );

program
  .command("import")
  .description("Load signatures from a JSON file")
  .argument("<file>", "signature JSON file")
  .action((file: string, _opts: unknown, cmd: Command) =>
    withContext(cmd, (ctx) => runImport(ctx, file))
  );

program
  .command("export")
  .description("Write all signatures to a JSON file")
  .argument("<file>", "output JSON file")
  .action((file: string, _opts: unknown, cmd: Command) =>
    withContext(cmd, (ctx) => runExport(ctx, file))
  );

program
  .command("status")
  .description("Show database location, signature count and configuration")
  .option("-v, --verbose", "Also list supported extensions")
  .action((opts: StatusOptions, cmd: Command) =>
    withContext(cmd, (ctx) => runStatus(ctx, opts))
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("bytewarden error:", errorMessage(err));
  process.exit(ExitCode.Error);
});
