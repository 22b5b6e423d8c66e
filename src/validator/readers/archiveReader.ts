import { FileReadError } from "../../core/errors.js";
import { normalizeExtension } from "../../util/hex.js";
import { ByteReader } from "./fileBytes.js";
import { hasZipEndRecord, listZipEntries } from "./zip.js";

/**
 * Plain ZIP archives. Any well-formed container passes; contents are not
 * inspected.
 */
export class ArchiveReader extends ByteReader {
  readonly kind = "archive";

  supports(extension: string): boolean {
    return normalizeExtension(extension) === "zip";
  }

  validateStructure(filePath: string, _extension: string): boolean {
    if (!hasZipEndRecord(filePath)) {
      this.log.warn({ filePath }, "not a ZIP container");
      return false;
    }
    try {
      listZipEntries(filePath);
    } catch (err) {
      if (!(err instanceof FileReadError)) throw err;
      this.log.warn({ filePath, err: err.message }, "ZIP central directory unreadable");
      return false;
    }
    return true;
  }
}
