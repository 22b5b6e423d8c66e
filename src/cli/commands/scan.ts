import { printDigest, printOutcome } from "../../validator/report/printer.js";
import type { ValidationOutcome } from "../../validator/report/types.js";
import { ensureSignatures, type CliContext } from "../context.js";
import { ExitCode } from "../exitCodes.js";

export type ScanOptions = {
  verbose?: boolean;
  hash?: boolean;
};

export function exitCodeFor(outcome: ValidationOutcome): ExitCode {
  switch (outcome.status) {
    case "valid":
      return ExitCode.Ok;
    case "invalid":
      return ExitCode.Invalid;
    case "fault":
      switch (outcome.kind) {
        case "file-read":
          return ExitCode.FileError;
        case "signature-not-found":
          return ExitCode.UnknownType;
        case "invalid-signature":
          return ExitCode.Error;
      }
  }
}

export async function runScan(
  ctx: CliContext,
  file: string,
  opts: ScanOptions = {}
): Promise<ExitCode> {
  ensureSignatures(ctx);
  if (opts.verbose) ctx.out.log(`Scanning: ${file}`);

  const outcome = ctx.validator.inspect(file);
  printOutcome(ctx.out, outcome, opts.verbose);

  const unreadable = outcome.status === "fault" && outcome.kind === "file-read";
  if (opts.hash && !unreadable) {
    printDigest(ctx.out, file, await ctx.validator.computeDigest(file));
  }
  return exitCodeFor(outcome);
}
