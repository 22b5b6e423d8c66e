import { normalizeExtension } from "../../util/hex.js";
import { ByteReader } from "./fileBytes.js";
import { hasZipEndRecord, listZipEntries } from "./zip.js";

const CONTENT_TYPES = "[Content_Types].xml";

/** Entries an Office Open XML package must contain, per extension. */
export const OFFICE_MANIFESTS: Readonly<Record<string, readonly string[]>> = {
  docx: [CONTENT_TYPES, "word/document.xml"],
  xlsx: [CONTENT_TYPES, "xl/workbook.xml"],
  pptx: [CONTENT_TYPES, "ppt/presentation.xml"],
};

/**
 * ZIP-based office documents. A matching `PK\x03\x04` header is not enough:
 * the package must also carry the entries its format requires.
 */
export class CompositeReader extends ByteReader {
  readonly kind = "composite";

  supports(extension: string): boolean {
    return Object.hasOwn(OFFICE_MANIFESTS, normalizeExtension(extension));
  }

  validateStructure(filePath: string, extension: string): boolean {
    const ext = normalizeExtension(extension);
    const required = Object.hasOwn(OFFICE_MANIFESTS, ext)
      ? OFFICE_MANIFESTS[ext]
      : undefined;
    if (!required) {
      this.log.warn({ extension: ext }, "not an office document extension");
      return false;
    }

    if (!hasZipEndRecord(filePath)) {
      this.log.warn({ filePath }, "not a ZIP container");
      return false;
    }

    const entries = new Set(listZipEntries(filePath));
    this.log.debug({ filePath, entries: entries.size }, "container entries listed");

    const missing = required.filter((name) => !entries.has(name));
    if (missing.length > 0) {
      this.log.warn({ filePath, extension: ext, missing }, "required entries missing");
      return false;
    }
    return true;
  }
}
