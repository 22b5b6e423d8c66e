import Database from "better-sqlite3";
import type { Logger } from "pino";
import {
  DatabaseError,
  DuplicateSignatureError,
  InvalidInputError,
  SignatureNotFoundError,
  errorMessage,
} from "../core/errors.js";
import { isHex, normalizeExtension, normalizeHex } from "../util/hex.js";
import { openDb, type DB } from "./db.js";

export type Signature = {
  magicBytes: string;
  offset: number;
};

export interface SignatureRecord extends Signature {
  extension: string;
  description: string | null;
  mimeType: string | null;
}

export type NewSignature = {
  extension: string;
  magicBytes: string;
  offset?: number;
  description?: string | null;
  mimeType?: string | null;
};

type Row = {
  extension: string;
  magic_bytes: string;
  byte_offset: number;
  description: string | null;
  mime_type: string | null;
};

/**
 * What the validator borrows from the store: lookups, and closing it when the
 * session ends.
 */
export interface SignatureSource {
  getSignatures(extension: string): Signature[];
  close(): void;
}

/**
 * SQLite-backed mapping from extension to magic-byte signatures.
 *
 * Every mutating call is its own transaction; there is no commit step.
 * One extension may own several records (e.g. JPEG variants), unique on
 * (extension, magic bytes, offset).
 */
export class SignatureStore implements SignatureSource {
  private db: DB | null = null;

  constructor(
    readonly dbPath: string,
    private log: Logger
  ) {
    try {
      this.db = openDb(dbPath);
    } catch (err) {
      const msg = `Failed to open signature database at '${dbPath}': ${errorMessage(err)}`;
      log.error({ err }, msg);
      throw new DatabaseError(msg);
    }
    log.debug({ dbPath }, "signature store opened");
  }

  getSignatures(extension: string): Signature[] {
    return this.getSignatureRecords(extension).map(({ magicBytes, offset }) => ({
      magicBytes,
      offset,
    }));
  }

  /** Full records for an extension, in insertion order. */
  getSignatureRecords(extension: string): SignatureRecord[] {
    const ext = normalizeExtension(extension);
    const rows = this.query(`query signatures for '.${ext}'`, (db) =>
      db
        .prepare<[string], Row>(
          `SELECT extension, magic_bytes, byte_offset, description, mime_type
           FROM signatures WHERE extension = ? ORDER BY id`
        )
        .all(ext)
    );

    if (rows.length === 0) {
      this.log.debug({ extension: ext }, "no signature registered");
      throw new SignatureNotFoundError(ext);
    }
    this.log.debug({ extension: ext, count: rows.length }, "signatures found");
    return rows.map(toRecord);
  }

  addSignature(input: NewSignature): SignatureRecord {
    const extension = normalizeExtension(input.extension);
    const magicBytes = normalizeHex(input.magicBytes);
    const offset = input.offset ?? 0;

    if (!extension) throw new InvalidInputError("Extension cannot be empty");
    if (!magicBytes) throw new InvalidInputError("Magic bytes cannot be empty");
    if (!isHex(magicBytes)) {
      throw new InvalidInputError(
        `Invalid hex string for magic bytes: '${input.magicBytes}'`
      );
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidInputError(
        `Offset must be a non-negative integer, got ${offset}`
      );
    }

    const record: SignatureRecord = {
      extension,
      magicBytes,
      offset,
      description: input.description ?? null,
      mimeType: input.mimeType ?? null,
    };

    try {
      this.conn()
        .prepare<[string, string, number, string | null, string | null]>(
          `INSERT INTO signatures (extension, magic_bytes, byte_offset, description, mime_type)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(extension, magicBytes, offset, record.description, record.mimeType);
    } catch (err) {
      if (
        err instanceof Database.SqliteError &&
        err.code.startsWith("SQLITE_CONSTRAINT")
      ) {
        throw new DuplicateSignatureError(extension, magicBytes, offset);
      }
      if (err instanceof DatabaseError) throw err;
      throw new DatabaseError(
        `Failed to add signature for '.${extension}': ${errorMessage(err)}`
      );
    }

    this.log.debug({ extension, magicBytes, offset }, "signature added");
    return record;
  }

  /** Distinct registered extensions, sorted. */
  allExtensions(): string[] {
    return this.query("list extensions", (db) =>
      db
        .prepare<[], { extension: string }>(
          "SELECT DISTINCT extension FROM signatures ORDER BY extension"
        )
        .all()
        .map((r) => r.extension)
    );
  }

  /** Number of signature records (not distinct extensions). */
  count(): number {
    return this.query("count signatures", (db) => {
      const row = db
        .prepare<[], { c: number }>("SELECT COUNT(*) AS c FROM signatures")
        .get();
      return row?.c ?? 0;
    });
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.log.debug({ dbPath: this.dbPath }, "signature store closed");
  }

  private conn(): DB {
    if (!this.db) throw new DatabaseError("Signature store is closed");
    return this.db;
  }

  private query<T>(what: string, fn: (db: DB) => T): T {
    const db = this.conn();
    try {
      return fn(db);
    } catch (err) {
      const msg = `Failed to ${what}: ${errorMessage(err)}`;
      this.log.error({ err }, msg);
      throw new DatabaseError(msg);
    }
  }
}

function toRecord(row: Row): SignatureRecord {
  return {
    extension: row.extension,
    magicBytes: row.magic_bytes,
    offset: row.byte_offset,
    description: row.description,
    mimeType: row.mime_type,
  };
}
