import { describe, it, expect } from "vitest";
import { ArchiveReader } from "../../src/validator/readers/archiveReader.js";
import { CompositeReader } from "../../src/validator/readers/compositeReader.js";
import { FlatReader } from "../../src/validator/readers/flatReader.js";
import { ReaderSelector } from "../../src/validator/readers/selector.js";
import { silentLogger } from "../helpers/fixtures.js";

describe("ReaderSelector", () => {
  const selector = new ReaderSelector(silentLogger);

  it("should pick the composite reader for office packages, never the archive reader", () => {
    for (const ext of ["docx", "xlsx", "pptx", ".DOCX"]) {
      const reader = selector.select(ext);
      expect(reader).toBeInstanceOf(CompositeReader);
      expect(reader.kind).toBe("composite");
    }
  });

  it("should pick the archive reader for zip", () => {
    expect(selector.select("zip")).toBeInstanceOf(ArchiveReader);
  });

  it("should pick the flat reader for simple formats", () => {
    expect(selector.select("pdf")).toBeInstanceOf(FlatReader);
    expect(selector.select("PNG").kind).toBe("flat");
  });

  it("should fall back to the flat reader for unknown extensions", () => {
    const reader = selector.select("unknownext");
    expect(reader).toBeInstanceOf(FlatReader);
    expect(reader).toBe(selector.select("pdf"));
  });
});
