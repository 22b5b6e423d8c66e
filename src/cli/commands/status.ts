import type { CliContext } from "../context.js";
import { ExitCode } from "../exitCodes.js";

const pad = (s: string, n = 16) => (s + "...").padEnd(n, ".");

export type StatusOptions = { verbose?: boolean };

export function runStatus(ctx: CliContext, opts: StatusOptions = {}): ExitCode {
  const count = ctx.store.count();

  ctx.out.log("bytewarden status");
  ctx.out.log(`  ${pad("database")}${ctx.config.dbPath}`);
  ctx.out.log(`  ${pad("signatures")}${count}`);
  ctx.out.log(`  ${pad("logs")}${ctx.config.logDir}`);
  ctx.out.log(`  ${pad("max file size")}${ctx.config.maxFileSize} bytes`);

  if (count === 0) {
    ctx.out.log("  database is empty; any scan command will initialize it");
  } else if (opts.verbose) {
    ctx.out.log("");
    ctx.out.log(`Supported extensions: ${ctx.store.allExtensions().join(", ")}`);
  }
  return ExitCode.Ok;
}
