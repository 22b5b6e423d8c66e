export type ReaderKind = "flat" | "composite" | "archive";

/**
 * Strategy for pulling raw bytes out of a candidate file and checking the
 * format-specific structure behind them.
 */
export interface ContentReader {
  readonly kind: ReaderKind;

  /**
   * Read up to `length` bytes at `offset`. Returns fewer bytes at end of file,
   * never pads. Throws FileReadError on any I/O failure.
   */
  readBytes(filePath: string, length: number, offset?: number): Buffer;

  /** Pure predicate, no I/O. */
  supports(extension: string): boolean;

  /**
   * Format-specific nested validation. Formats without internal structure
   * return true.
   */
  validateStructure(filePath: string, extension: string): boolean;
}
