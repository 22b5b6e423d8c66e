import AdmZip from "adm-zip";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pino } from "pino";
import { SignatureStore, type NewSignature } from "../../src/storage/signatureStore.js";
import type { CliContext } from "../../src/cli/context.js";
import { loadConfig } from "../../src/util/config.js";
import { FileValidator } from "../../src/validator/validator.js";

export const silentLogger = pino({ level: "silent" });

export const PDF_HEAD = [0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x37];
export const PNG_HEAD = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function makeTmpDir(prefix = "bytewarden-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeBytes(
  dir: string,
  name: string,
  bytes: number[] | Buffer
): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes));
  return file;
}

/** A ZIP container holding the named entries (content is irrelevant). */
export function zipWith(entries: string[]): Buffer {
  const zip = new AdmZip();
  for (const name of entries) {
    zip.addFile(name, Buffer.from(`<${name}/>`));
  }
  return zip.toBuffer();
}

/**
 * Local-header magic followed by garbage, then an end-of-central-directory
 * record claiming one entry at offset 0 where no central header exists.
 */
export function brokenZip(): Buffer {
  const body = Buffer.alloc(64, 0);
  body.writeUInt32LE(0x04034b50, 0);
  const eocd = Buffer.alloc(22, 0);
  eocd.writeUInt32LE(0x06054b50, 0);
  eocd.writeUInt16LE(1, 8); // entries on this disk
  eocd.writeUInt16LE(1, 10); // total entries
  eocd.writeUInt32LE(46, 12); // central directory size
  eocd.writeUInt32LE(0, 16); // central directory offset
  return Buffer.concat([body, eocd]);
}

export function memoryStore(signatures: NewSignature[] = []): SignatureStore {
  const store = new SignatureStore(":memory:", silentLogger);
  for (const sig of signatures) store.addSignature(sig);
  return store;
}

export type CapturedOutput = { stdout: string[]; stderr: string[] };

export function testContext(
  signatures: NewSignature[] = [],
  env: NodeJS.ProcessEnv = {}
): CliContext & { captured: CapturedOutput } {
  const config = loadConfig({
    BYTEWARDEN_HOME: "/tmp/bytewarden-home",
    BYTEWARDEN_DB_PATH: ":memory:",
    ...env,
  });
  const store = memoryStore(signatures);
  const validator = new FileValidator({
    store,
    logger: silentLogger,
    maxFileSize: config.maxFileSize,
  });
  const captured: CapturedOutput = { stdout: [], stderr: [] };
  return {
    config,
    log: silentLogger,
    store,
    validator,
    out: {
      log: (line) => captured.stdout.push(line),
      error: (line) => captured.stderr.push(line),
    },
    captured,
  };
}
