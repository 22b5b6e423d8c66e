import { normalizeExtension } from "../../util/hex.js";
import { ByteReader } from "./fileBytes.js";

export const FLAT_EXTENSIONS: ReadonlySet<string> = new Set([
  // documents
  "pdf", "xml", "html", "json", "rtf",
  // images
  "png", "jpg", "jpeg", "gif", "bmp", "ico", "webp", "tif", "tiff",
  // audio / video
  "mp3", "mp4", "avi", "mkv", "wav", "flac", "ogg",
  // archives (zip has its own reader)
  "tar", "gz", "rar", "7z", "bz2", "xz",
  // binaries
  "exe", "dll", "elf", "class", "wasm", "sqlite", "db",
]);

/**
 * Formats whose magic bytes are the whole story: no structure check.
 */
export class FlatReader extends ByteReader {
  readonly kind = "flat";

  supports(extension: string): boolean {
    return FLAT_EXTENSIONS.has(normalizeExtension(extension));
  }

  validateStructure(_filePath: string, extension: string): boolean {
    this.log.debug({ extension }, "flat format, no structure check");
    return true;
  }
}
