import fs from "node:fs";
import type { Logger } from "pino";
import {
  DuplicateSignatureError,
  FileReadError,
  InvalidInputError,
  errorMessage,
} from "../core/errors.js";
import type { SignatureStore } from "../storage/signatureStore.js";
import { signatureFileSchema, type SignatureFile } from "./schema.js";

export type LoadResult = { loaded: number; skipped: number };

/**
 * Read and schema-check a signature JSON file.
 * Throws FileReadError when it cannot be read, InvalidInputError when it is
 * not valid JSON or not the expected shape.
 */
export function readSignatureFile(sourcePath: string): SignatureFile {
  let text: string;
  try {
    text = fs.readFileSync(sourcePath, "utf8");
  } catch (err) {
    throw new FileReadError(
      `Cannot read signature file '${sourcePath}': ${errorMessage(err)}`,
      sourcePath
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidInputError(
      `Invalid JSON in '${sourcePath}': ${errorMessage(err)}`
    );
  }

  const parsed = signatureFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new InvalidInputError(
      `Invalid signature file '${sourcePath}' at ${where}: ${issue.message}`
    );
  }
  return parsed.data;
}

export function validateSignatureFile(sourcePath: string): boolean {
  try {
    readSignatureFile(sourcePath);
    return true;
  } catch (err) {
    if (err instanceof FileReadError || err instanceof InvalidInputError) {
      return false;
    }
    throw err;
  }
}

/**
 * Register every signature of a JSON file. Duplicates already in the store
 * are skipped; any other failure aborts the load.
 */
export function loadSignatures(
  sourcePath: string,
  store: Pick<SignatureStore, "addSignature">,
  log: Logger
): LoadResult {
  log.info({ sourcePath }, "loading signatures");
  const file = readSignatureFile(sourcePath);

  let loaded = 0;
  let skipped = 0;
  for (const entry of file.signatures) {
    try {
      store.addSignature({
        extension: entry.extension,
        magicBytes: entry.magic_bytes,
        offset: entry.offset ?? 0,
        description: entry.description,
        mimeType: entry.mime_type,
      });
      loaded++;
    } catch (err) {
      if (!(err instanceof DuplicateSignatureError)) throw err;
      log.debug({ extension: err.extension }, err.message);
      skipped++;
    }
  }

  log.info({ sourcePath, loaded, skipped }, "signatures loaded");
  return { loaded, skipped };
}
