const HEX_RE = /^(?:[0-9A-F]{2})+$/;

/** Lowercase, leading dots stripped. */
export function normalizeExtension(extension: string): string {
  return extension.trim().toLowerCase().replace(/^\.+/, "");
}

/** Uppercase, whitespace removed. Does not check that the result is hex. */
export function normalizeHex(hex: string): string {
  return hex.replace(/\s+/g, "").toUpperCase();
}

export function isHex(hex: string): boolean {
  return HEX_RE.test(normalizeHex(hex));
}

/**
 * Decode a hex pattern into bytes. Returns null for anything that is not an
 * even-length run of hex digits (Buffer.from would silently truncate).
 */
export function decodeHex(hex: string): Buffer | null {
  const norm = normalizeHex(hex);
  if (!HEX_RE.test(norm)) return null;
  return Buffer.from(norm, "hex");
}

export function toHex(buf: Uint8Array): string {
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength)
    .toString("hex")
    .toUpperCase();
}
