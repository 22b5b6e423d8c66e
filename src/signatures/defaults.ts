import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import type { SignatureStore } from "../storage/signatureStore.js";
import { loadSignatures } from "./loader.js";

const here = path.dirname(fileURLToPath(import.meta.url));

/**
 * Where the bundled signature set may live: beside the sources
 * (src/signatures → data/) or beside the build (dist/src/signatures → data/).
 */
export function bundledSignatureCandidates(cwd = process.cwd()): string[] {
  return [
    path.resolve(here, "../../data/signatures.json"),
    path.resolve(here, "../../../data/signatures.json"),
    path.join(cwd, "data", "signatures.json"),
  ];
}

/**
 * Seed an empty store from the first signature file found. Returns how many
 * records were loaded (0 when the store already had some).
 */
export function initializeDefaultSignatures(
  store: Pick<SignatureStore, "addSignature" | "count">,
  log: Logger,
  explicitPath?: string
): number {
  const existing = store.count();
  if (existing > 0) {
    log.debug({ count: existing }, "store already populated");
    return 0;
  }

  const candidates = explicitPath
    ? [explicitPath, ...bundledSignatureCandidates()]
    : bundledSignatureCandidates();

  const source = candidates.find((p) => fs.existsSync(p));
  if (!source) {
    log.warn({ candidates }, "no signature file found, store stays empty");
    return 0;
  }
  return loadSignatures(source, store, log).loaded;
}
