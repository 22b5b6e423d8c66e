import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import {
  FileReadError,
  InvalidSignatureError,
  SignatureNotFoundError,
  ValidationError,
  errorMessage,
} from "../core/errors.js";
import type { Signature, SignatureSource } from "../storage/signatureStore.js";
import { DEFAULT_MAX_FILE_SIZE } from "../util/config.js";
import { decodeHex, normalizeExtension, normalizeHex, toHex } from "../util/hex.js";
import { ReaderSelector } from "./readers/selector.js";
import type { ContentReader } from "./readers/types.js";
import type {
  FaultOutcome,
  InvalidOutcome,
  ValidationOutcome,
} from "./report/types.js";
import { sha256File } from "./utils/checksum.js";

/** Bytes shown as "Found" when no signature matches. */
const PREVIEW_BYTES = 8;

export type FileValidatorOptions = {
  store: SignatureSource;
  logger: Logger;
  selector?: ReaderSelector;
  maxFileSize?: number;
};

export class FileValidator {
  readonly maxFileSize: number;
  private readonly store: SignatureSource;
  private readonly selector: ReaderSelector;
  private readonly log: Logger;
  private closed = false;

  constructor(opts: FileValidatorOptions) {
    this.store = opts.store;
    this.log = opts.logger;
    this.selector = opts.selector ?? new ReaderSelector(opts.logger);
    this.maxFileSize = opts.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  }

  /**
   * Check a file's content against the signatures registered for its
   * extension. Mismatches are returned as `invalid` outcomes, I/O problems
   * and reference-data gaps as `fault` outcomes; nothing expected is thrown.
   */
  inspect(filePath: string): ValidationOutcome {
    this.log.info({ filePath }, "validating file");

    let size: number;
    try {
      const stat = fs.statSync(filePath);
      if (!stat.isFile()) {
        return this.fileFault(filePath, `Path is not a file: '${filePath}'`);
      }
      size = stat.size;
    } catch (err) {
      const msg =
        isErrnoException(err) && err.code === "ENOENT"
          ? `File not found: '${filePath}'`
          : `Cannot access file '${filePath}': ${errorMessage(err)}`;
      return this.fileFault(filePath, msg);
    }

    if (size > this.maxFileSize) {
      return this.fileFault(
        filePath,
        `File too large: ${size} bytes (max: ${this.maxFileSize})`
      );
    }

    const extension = normalizeExtension(path.extname(filePath));
    if (!extension) {
      return this.invalid({
        filePath,
        extension,
        reason: "no-extension",
        message: `File has no extension: '${filePath}'`,
      });
    }

    const reader = this.selector.select(extension);

    let signatures: Signature[];
    try {
      signatures = this.store.getSignatures(extension);
    } catch (err) {
      if (!(err instanceof SignatureNotFoundError)) throw err;
      this.log.warn({ filePath, extension }, err.message);
      return { status: "fault", filePath, kind: "signature-not-found", error: err };
    }

    try {
      return this.matchSignatures(filePath, extension, reader, signatures);
    } catch (err) {
      if (!(err instanceof FileReadError)) throw err;
      this.log.error({ filePath }, err.message);
      return { status: "fault", filePath, kind: "file-read", error: err };
    }
  }

  /**
   * Boolean form of {@link inspect}: true when the file matches, otherwise
   * throws ValidationError, FileReadError, SignatureNotFoundError or
   * InvalidSignatureError.
   */
  validate(filePath: string): boolean {
    const outcome = this.inspect(filePath);
    switch (outcome.status) {
      case "valid":
        return true;
      case "invalid":
        throw new ValidationError(outcome.message);
      case "fault":
        throw outcome.error;
    }
  }

  async computeDigest(filePath: string): Promise<string> {
    this.log.debug({ filePath }, "computing SHA-256");
    const digest = await sha256File(filePath);
    this.log.debug({ filePath, digest }, "SHA-256 computed");
    return digest;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.store.close();
  }

  private matchSignatures(
    filePath: string,
    extension: string,
    reader: ContentReader,
    signatures: Signature[]
  ): ValidationOutcome {
    this.log.debug({ extension, count: signatures.length }, "checking signatures");

    let lastExpected = "";
    for (const sig of signatures) {
      const expected = decodeHex(sig.magicBytes);
      if (!expected) {
        const error = new InvalidSignatureError(
          `Invalid magic bytes format: '${sig.magicBytes}' (must be hex string)`
        );
        this.log.error({ extension }, error.message);
        return { status: "fault", filePath, kind: "invalid-signature", error };
      }
      lastExpected = normalizeHex(sig.magicBytes);

      const actual = reader.readBytes(filePath, expected.length, sig.offset);
      if (!actual.equals(expected)) {
        this.log.debug(
          { offset: sig.offset, expected: lastExpected, actual: toHex(actual) },
          "magic bytes mismatch"
        );
        continue;
      }

      this.log.debug({ offset: sig.offset, magicBytes: lastExpected }, "magic bytes match");
      // First magic-byte match decides; a structure failure does not fall
      // through to the remaining signatures.
      if (!reader.validateStructure(filePath, extension)) {
        return this.invalid({
          filePath,
          extension,
          reason: "structure",
          message:
            `File '${filePath}' has correct magic bytes for '.${extension}' ` +
            `but failed internal structure validation`,
        });
      }

      this.log.info({ filePath, extension }, "file validated");
      return {
        status: "valid",
        filePath,
        extension,
        reader: reader.kind,
        matched: { magicBytes: lastExpected, offset: sig.offset },
      };
    }

    const found = toHex(reader.readBytes(filePath, PREVIEW_BYTES, 0));
    return this.invalid({
      filePath,
      extension,
      reason: "mismatch",
      expected: lastExpected,
      actual: found,
      message:
        `File '${filePath}' has extension '.${extension}' but magic bytes ` +
        `don't match. Expected: ${lastExpected}, Found: ${found}`,
    });
  }

  private invalid(outcome: Omit<InvalidOutcome, "status">): InvalidOutcome {
    this.log.warn({ filePath: outcome.filePath, reason: outcome.reason }, outcome.message);
    return { status: "invalid", ...outcome };
  }

  private fileFault(filePath: string, message: string): FaultOutcome {
    this.log.error({ filePath }, message);
    return {
      status: "fault",
      filePath,
      kind: "file-read",
      error: new FileReadError(message, filePath),
    };
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
