import fs from "node:fs";
import type { Logger } from "pino";
import { FileReadError, errorMessage } from "../../core/errors.js";
import { toHex } from "../../util/hex.js";
import type { ContentReader, ReaderKind } from "./types.js";

export function readFileBytes(
  filePath: string,
  length: number,
  offset = 0
): Buffer {
  if (!Number.isInteger(length) || length < 0) {
    throw new FileReadError(`Invalid read length ${length}`, filePath);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new FileReadError(`Invalid read offset ${offset}`, filePath);
  }

  let fd: number | null = null;
  try {
    fd = fs.openSync(filePath, "r");
    const buf = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const n = fs.readSync(fd, buf, filled, length - filled, offset + filled);
      if (n === 0) break; // EOF
      filled += n;
    }
    return filled === length ? buf : buf.subarray(0, filled);
  } catch (err) {
    throw new FileReadError(
      `Failed to read file '${filePath}': ${errorMessage(err)}`,
      filePath
    );
  } finally {
    if (fd !== null) fs.closeSync(fd);
  }
}

/**
 * Shared byte access for the reader strategies; subclasses add the format
 * knowledge.
 */
export abstract class ByteReader implements ContentReader {
  abstract readonly kind: ReaderKind;

  constructor(protected log: Logger) {}

  readBytes(filePath: string, length: number, offset = 0): Buffer {
    const buf = readFileBytes(filePath, length, offset);
    this.log.trace({ filePath, offset, bytes: toHex(buf) }, "read bytes");
    return buf;
  }

  abstract supports(extension: string): boolean;

  abstract validateStructure(filePath: string, extension: string): boolean;
}
