import AdmZip from "adm-zip";
import fs from "node:fs";
import { FileReadError, errorMessage } from "../../core/errors.js";
import { readFileBytes } from "./fileBytes.js";

const EOCD_SIG = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const EOCD_LEN = 22;
const MAX_COMMENT_LEN = 0xffff;

/**
 * True when an end-of-central-directory record sits in the tail of the file,
 * i.e. the file is laid out as a ZIP container. Says nothing about whether
 * the central directory itself is readable.
 */
export function hasZipEndRecord(filePath: string): boolean {
  let size: number;
  try {
    size = fs.statSync(filePath).size;
  } catch (err) {
    throw new FileReadError(
      `Failed to access file '${filePath}': ${errorMessage(err)}`,
      filePath
    );
  }
  if (size < EOCD_LEN) return false;

  const tailLen = Math.min(size, EOCD_LEN + MAX_COMMENT_LEN);
  const tail = readFileBytes(filePath, tailLen, size - tailLen);
  const at = tail.lastIndexOf(EOCD_SIG);
  return at !== -1 && tail.length - at >= EOCD_LEN;
}

/**
 * Names of every entry in the container's central directory.
 * Throws FileReadError when the directory cannot be read.
 */
export function listZipEntries(filePath: string): string[] {
  try {
    const zip = new AdmZip(filePath);
    return zip.getEntries().map((e) => e.entryName);
  } catch (err) {
    throw new FileReadError(
      `Corrupted ZIP container '${filePath}': ${errorMessage(err)}`,
      filePath
    );
  }
}
