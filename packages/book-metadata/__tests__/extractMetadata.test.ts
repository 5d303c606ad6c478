import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isLibraryError } from "@marginalia/core-platform";
import { extractMetadata, readEpubMetadata, readPdfMetadata } from "@marginalia/book-metadata";
import { bookFromMetadata } from "@marginalia/library-store";
import { buildObjectStreamPdf, buildPdf } from "./helpers/pdf";
import { buildEpub, buildZip } from "./helpers/zip";

const COVER = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("readEpubMetadata", () => {
  it("reads title, creator, cover and spine length", () => {
    const epub = buildEpub({ title: "The Quiet Shore", creator: "Ada Marsh", chapters: 3, cover: COVER });

    const metadata = readEpubMetadata(epub);

    expect(metadata.title).toBe("The Quiet Shore");
    expect(metadata.author).toBe("Ada Marsh");
    expect(metadata.totalPages).toBe(3);
    expect(metadata.coverData).toEqual(COVER);
  });

  it("reads deflated entries and the EPUB 2 cover reference", () => {
    const epub = buildEpub({ title: "Tide Tables", chapters: 2, cover: COVER, coverStyle: "meta", deflate: true });

    const metadata = readEpubMetadata(epub);

    expect(metadata.title).toBe("Tide Tables");
    expect(metadata.totalPages).toBe(2);
    expect(metadata.coverData).toEqual(COVER);
  });

  it("decodes entities and leaves missing fields absent", () => {
    const metadata = readEpubMetadata(buildEpub({ title: "Salt &amp; Stone", chapters: 1 }));

    expect(metadata).toEqual({ title: "Salt & Stone", author: undefined, coverData: undefined, totalPages: 1 });
  });

  it("rejects data that is not a ZIP container", () => {
    const error = captureError(() => readEpubMetadata(new TextEncoder().encode("plain text"), "notes.epub"));

    expect(isLibraryError(error, "parse_error")).toBe(true);
    expect(isLibraryError(error) && error.source).toBe("notes.epub");
  });

  it("rejects an archive without a container descriptor", () => {
    const archive = buildZip([{ path: "mimetype", content: "application/epub+zip" }]);

    const error = captureError(() => readEpubMetadata(archive));

    expect(isLibraryError(error, "parse_error")).toBe(true);
    expect(isLibraryError(error) && error.code).toBe("EPUB_CONTAINER_MISSING");
  });
});

describe("readPdfMetadata", () => {
  it("counts pages and reads the info dictionary", async () => {
    const metadata = await readPdfMetadata(buildPdf({ title: "Field Notes", author: "R. Vale", pages: 4 }));

    expect(metadata).toEqual({ title: "Field Notes", author: "R. Vale", totalPages: 4 });
  });

  it("unescapes literal strings", async () => {
    const metadata = await readPdfMetadata(buildPdf({ title: "Notes \\(draft\\)", pages: 1 }));

    expect(metadata.title).toBe("Notes (draft)");
  });

  it("counts pages kept in a compressed object stream", async () => {
    const pdf = buildObjectStreamPdf({ title: "Tide Tables", pages: 3 });

    const metadata = await readPdfMetadata(pdf);

    expect(metadata).toEqual({ title: "Tide Tables", author: undefined, totalPages: 3 });
  });

  it("takes the title from the document info, not from bookmarks", async () => {
    const pdf = buildPdf({ title: "Real Book Title", pages: 2, outline: ["Chapter 1: Beginnings", "Chapter 2: Crossings"] });

    const metadata = await readPdfMetadata(pdf);

    expect(metadata.title).toBe("Real Book Title");
    expect(metadata.totalPages).toBe(2);
  });

  it("leaves the title unset when only bookmarks carry one", async () => {
    const pdf = buildPdf({ pages: 1, outline: ["Chapter 1: Beginnings"] });

    const metadata = await readPdfMetadata(pdf);

    expect(metadata.title).toBeUndefined();
    expect(bookFromMetadata("/books/atlas-of-tides.pdf", metadata).title).toBe("atlas-of-tides");
  });

  it("rejects data that is not a PDF", async () => {
    const error = await readPdfMetadata(new TextEncoder().encode("GIF89a"), "cover.pdf").catch(
      (reason: unknown) => reason,
    );

    expect(isLibraryError(error, "parse_error")).toBe(true);
    expect(isLibraryError(error) && error.code).toBe("PDF_UNREADABLE");
    expect(isLibraryError(error) && error.source).toBe("cover.pdf");
  });
});

describe("extractMetadata", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "book-metadata-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("dispatches on the file extension", async () => {
    const epubPath = join(dir, "shore.EPUB");
    const pdfPath = join(dir, "notes.pdf");
    await writeFile(epubPath, buildEpub({ title: "The Quiet Shore", chapters: 5 }));
    await writeFile(pdfPath, buildPdf({ pages: 2 }));

    await expect(extractMetadata(epubPath)).resolves.toMatchObject({ title: "The Quiet Shore", totalPages: 5 });
    await expect(extractMetadata(pdfPath)).resolves.toMatchObject({ totalPages: 2 });
  });

  it("reports a missing file as file_not_found", async () => {
    const missing = join(dir, "missing.pdf");

    const error = await extractMetadata(missing).catch((reason: unknown) => reason);

    expect(isLibraryError(error, "file_not_found")).toBe(true);
    expect(isLibraryError(error) && error.message).toBe(`File not found: ${missing}`);
  });

  it("reports an unknown extension as unsupported_format", async () => {
    const textPath = join(dir, "readme.txt");
    await writeFile(textPath, "hello");

    const error = await extractMetadata(textPath).catch((reason: unknown) => reason);

    expect(isLibraryError(error, "unsupported_format")).toBe(true);
    expect(isLibraryError(error) && error.message).toBe("Unsupported format: txt");
  });

  it("reports a directory as io_error", async () => {
    const folder = join(dir, "folder.epub");
    await mkdir(folder);

    const error = await extractMetadata(folder).catch((reason: unknown) => reason);

    expect(isLibraryError(error, "io_error")).toBe(true);
    expect(isLibraryError(error) && error.code).toBe("NOT_A_FILE");
  });

  it("surfaces parser failures as parse_error", async () => {
    const brokenPath = join(dir, "broken.epub");
    await writeFile(brokenPath, "not an archive");

    const error = await extractMetadata(brokenPath).catch((reason: unknown) => reason);

    expect(isLibraryError(error, "parse_error")).toBe(true);
  });
});
