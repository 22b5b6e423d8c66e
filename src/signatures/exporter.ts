import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { SignatureStore } from "../storage/signatureStore.js";
import type { SignatureEntry, SignatureFile } from "./schema.js";

export const EXPORT_FORMAT_VERSION = "1.0";

/** Build the JSON document for every record, extensions in sorted order. */
export function collectSignatures(
  store: Pick<SignatureStore, "allExtensions" | "getSignatureRecords">
): SignatureFile {
  const signatures: SignatureEntry[] = [];
  for (const ext of store.allExtensions()) {
    for (const rec of store.getSignatureRecords(ext)) {
      const entry: SignatureEntry = {
        extension: rec.extension,
        magic_bytes: rec.magicBytes,
        offset: rec.offset,
      };
      if (rec.description !== null) entry.description = rec.description;
      if (rec.mimeType !== null) entry.mime_type = rec.mimeType;
      signatures.push(entry);
    }
  }
  return {
    version: EXPORT_FORMAT_VERSION,
    description: "Exported file signatures",
    signatures,
  };
}

export function exportSignatures(
  store: Pick<SignatureStore, "allExtensions" | "getSignatureRecords">,
  outputPath: string,
  log: Logger
): number {
  const doc = collectSignatures(store);
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(doc, null, 2) + "\n", "utf8");
  log.info({ outputPath, count: doc.signatures.length }, "signatures exported");
  return doc.signatures.length;
}
