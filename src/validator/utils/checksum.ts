import fs from "node:fs";
import crypto from "node:crypto";
import type { FileHandle } from "node:fs/promises";
import { FileReadError, errorMessage } from "../../core/errors.js";

export const DIGEST_CHUNK_BYTES = 8 * 1024;

/** SHA-256 of the whole file as lowercase hex, read chunk by chunk. */
export async function sha256File(
  path: string,
  chunk = DIGEST_CHUNK_BYTES
): Promise<string> {
  const hash = crypto.createHash("sha256");
  let fd: FileHandle;
  try {
    fd = await fs.promises.open(path, "r");
  } catch (err) {
    throw new FileReadError(
      `Failed to hash file '${path}': ${errorMessage(err)}`,
      path
    );
  }
  const buf = Buffer.allocUnsafe(chunk);
  try {
    let pos = 0;
    while (true) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, pos);
      if (bytesRead <= 0) break;
      if (bytesRead === buf.length) {
        hash.update(buf);
      } else {
        hash.update(buf.subarray(0, bytesRead));
      }
      pos += bytesRead;
    }
  } catch (err) {
    throw new FileReadError(
      `Failed to hash file '${path}': ${errorMessage(err)}`,
      path
    );
  } finally {
    await fd.close();
  }
  return hash.digest("hex");
}
