import type { Logger } from "pino";
import { initializeDefaultSignatures } from "../signatures/defaults.js";
import { SignatureStore } from "../storage/signatureStore.js";
import type { AppConfig } from "../util/config.js";
import { FileValidator } from "../validator/validator.js";
import type { Output } from "../validator/report/printer.js";

export type CliContext = {
  config: AppConfig;
  log: Logger;
  store: SignatureStore;
  validator: FileValidator;
  out: Output;
};

export function openContext(config: AppConfig, log: Logger, out: Output): CliContext {
  const store = new SignatureStore(config.dbPath, log);
  const validator = new FileValidator({
    store,
    logger: log,
    maxFileSize: config.maxFileSize,
  });
  return { config, log, store, validator, out };
}

/** Seed an empty store from the bundled (or configured) signature file. */
export function ensureSignatures(ctx: CliContext) {
  if (ctx.store.count() > 0) return;
  ctx.out.log("Initializing signature database...");
  const loaded = initializeDefaultSignatures(
    ctx.store,
    ctx.log,
    ctx.config.signaturesFile
  );
  if (loaded > 0) ctx.out.log(`Loaded ${loaded} file signatures`);
}
