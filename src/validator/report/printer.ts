import path from "node:path";
import type { SignatureRecord } from "../../storage/signatureStore.js";
import type { ScanReport, ValidationOutcome } from "./types.js";

export type Output = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

const pad = (s: string, n = 22) => (s + "...").padEnd(n, ".");

const FAULT_LABELS = {
  "file-read": "File error",
  "signature-not-found": "Unknown file type",
  "invalid-signature": "Corrupt signature database",
} as const;

export function printOutcome(
  out: Output,
  outcome: ValidationOutcome,
  verbose = false
) {
  const name = path.basename(outcome.filePath);
  const where = verbose ? ` (${outcome.filePath})` : "";

  switch (outcome.status) {
    case "valid":
      out.log(`✅ ${name} - VALID${where}`);
      if (verbose) {
        out.log(
          `  matched ${outcome.matched.magicBytes} at offset ${outcome.matched.offset} (${outcome.reader} reader)`
        );
      }
      return;
    case "invalid":
      out.log(`❌ ${name} - INVALID${where}`);
      out.log(`  ${outcome.message}`);
      return;
    case "fault":
      out.error(`❌ ${name} - ${FAULT_LABELS[outcome.kind]}: ${outcome.error.message}`);
      return;
  }
}

export function printDigest(out: Output, filePath: string, digest: string) {
  out.log(`SHA-256: ${digest}  ${path.basename(filePath)}`);
}

export function printScanSummary(out: Output, report: ScanReport) {
  out.log("");
  out.log("[SUMMARY]");
  out.log(`  ${pad("total files")}${report.total}`);
  out.log(`  ${pad("valid")}${report.valid}`);
  out.log(
    `  ${pad("invalid")}${report.invalid}${report.invalid === 0 ? "  ✅" : "  ❌"}`
  );
  if (report.errors > 0) {
    out.log(`  ${pad("errors")}${report.errors}  ❌`);
  }
  out.log("");
  out.log(report.pass ? "PASS ✅" : "FAIL ❌");
}

export function printSignatures(
  out: Output,
  extension: string,
  records: SignatureRecord[]
) {
  const plural = records.length === 1 ? "" : "s";
  out.log(`.${extension} (${records.length} signature${plural})`);
  for (const rec of records) {
    out.log(`  ${pad("magic bytes", 16)}${rec.magicBytes}`);
    out.log(`  ${pad("offset", 16)}${rec.offset}`);
    if (rec.description) out.log(`  ${pad("description", 16)}${rec.description}`);
    if (rec.mimeType) out.log(`  ${pad("mime type", 16)}${rec.mimeType}`);
  }
}
