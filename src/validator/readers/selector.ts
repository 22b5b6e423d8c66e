import type { Logger } from "pino";
import { normalizeExtension } from "../../util/hex.js";
import { ArchiveReader } from "./archiveReader.js";
import { CompositeReader } from "./compositeReader.js";
import { FlatReader } from "./flatReader.js";
import type { ContentReader } from "./types.js";

/**
 * Picks the reader strategy for an extension: first supporting reader wins,
 * flat reader otherwise.
 */
export class ReaderSelector {
  private readonly flat: FlatReader;
  // Order matters: office packages are valid ZIP archives too, so the
  // composite reader must be consulted before the archive reader.
  private readonly readers: readonly ContentReader[];

  constructor(private log: Logger) {
    this.flat = new FlatReader(log);
    this.readers = [new CompositeReader(log), new ArchiveReader(log), this.flat];
  }

  select(extension: string): ContentReader {
    const ext = normalizeExtension(extension);
    const reader = this.readers.find((r) => r.supports(ext));
    if (reader) {
      this.log.debug({ extension: ext, reader: reader.kind }, "reader selected");
      return reader;
    }
    this.log.warn({ extension: ext }, "no specific reader, falling back to flat reader");
    return this.flat;
  }
}
