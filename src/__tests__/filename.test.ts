import { describe, it, expect } from "vitest";
import { normalizeArchivePath } from "../lib/filename";
import { InvalidExtensionError } from "../lib/errors";

describe("normalizeArchivePath", () => {
  it("appends .epub when there is no extension", () => {
    expect(normalizeArchivePath("/books/novel")).toBe("/books/novel.epub");
  });

  it("returns .epub paths unchanged", () => {
    expect(normalizeArchivePath("/books/novel.epub")).toBe("/books/novel.epub");
    expect(normalizeArchivePath("NOVEL.EPUB")).toBe("NOVEL.EPUB");
  });

  it("completes a trailing dot", () => {
    expect(normalizeArchivePath("novel.")).toBe("novel.epub");
  });

  it("rejects a foreign extension", () => {
    expect(() => normalizeArchivePath("novel.zip")).toThrow(InvalidExtensionError);
    try {
      normalizeArchivePath("novel.zip");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidExtensionError);
      if (err instanceof InvalidExtensionError) {
        expect(err.extension).toBe(".zip");
        expect(err.code).toBe("INVALID_EXTENSION");
      }
    }
  });

  it("replaces a foreign extension when coercing", () => {
    expect(normalizeArchivePath("book.txt", { coerce: true })).toBe("book.epub");
    expect(normalizeArchivePath("dir.d/book.tar.gz", { coerce: true })).toBe("dir.d/book.tar.epub");
  });

  it("is idempotent", () => {
    const samples = ["a", "a.", "a.epub", "dir/b.EPUB", "x.y/z", "book.txt", ".hidden", "v1.2/notes"];
    for (const sample of samples) {
      const once = normalizeArchivePath(sample, { coerce: true });
      expect(normalizeArchivePath(once)).toBe(once);
      expect(normalizeArchivePath(once, { coerce: true })).toBe(once);
    }
  });
});
