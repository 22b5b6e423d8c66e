import { describe, it, expect } from "vitest";
import {
  decodeHex,
  isHex,
  normalizeExtension,
  normalizeHex,
  toHex,
} from "../../src/util/hex.js";

describe("normalizeExtension", () => {
  it("should lowercase and strip leading dots", () => {
    expect(normalizeExtension(".PDF")).toBe("pdf");
    expect(normalizeExtension("..Tar")).toBe("tar");
    expect(normalizeExtension(" docx ")).toBe("docx");
  });

  it("should return empty string for a bare dot", () => {
    expect(normalizeExtension(".")).toBe("");
  });
});

describe("normalizeHex", () => {
  it("should uppercase and drop whitespace", () => {
    expect(normalizeHex("25 50 44 46")).toBe("25504446");
    expect(normalizeHex("ff\td8\nff")).toBe("FFD8FF");
  });
});

describe("isHex / decodeHex", () => {
  it("should accept even-length hex with separators", () => {
    expect(isHex("89 50 4e 47")).toBe(true);
    expect(decodeHex("89 50 4e 47")).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  });

  it("should reject odd length, non-hex characters and empty input", () => {
    expect(isHex("ABC")).toBe(false);
    expect(isHex("ZZ")).toBe(false);
    expect(isHex("")).toBe(false);
    expect(decodeHex("GG00")).toBeNull();
    expect(decodeHex("123")).toBeNull();
  });
});

describe("toHex", () => {
  it("should render uppercase hex", () => {
    expect(toHex(new Uint8Array([0x00, 0xab, 0x1f]))).toBe("00AB1F");
  });

  it("should respect subarray views", () => {
    const buf = Buffer.from([1, 2, 3, 4]).subarray(1, 3);
    expect(toHex(buf)).toBe("0203");
  });
});
