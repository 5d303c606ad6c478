import { basename, extname, resolve } from "node:path";
import { LibraryErrors } from "@marginalia/core-platform";
import { bookTypeFromPath, createBook } from "./models";
import type { Book, BookMetadata } from "./types";
import type { LibraryStore } from "./index";

/** Anything that can read a document's metadata: the boundary to the parsers. */
export interface MetadataSource {
  extract(filePath: string): Promise<BookMetadata>;
}

export type ImportResult =
  | { status: "imported"; book: Book }
  | { status: "duplicate"; book: Book };

/**
 * Seeds a new Book from parser output. The file type comes from the path's
 * extension; a missing title falls back to the file name without extension.
 */
export function bookFromMetadata(filePath: string, metadata: BookMetadata): Book {
  const fileType = bookTypeFromPath(filePath);
  if (!fileType) {
    throw LibraryErrors.unsupportedFormat(extname(filePath).replace(/^\./, ""), filePath);
  }

  const book = createBook({
    title: nonBlank(metadata.title) ?? fileStem(filePath),
    author: nonBlank(metadata.author),
    filePath,
    fileType,
    totalPages: metadata.totalPages,
  });
  if (metadata.coverData && metadata.coverData.byteLength > 0) {
    book.coverData = new Uint8Array(metadata.coverData);
  }
  return book;
}

export async function importBook(
  store: LibraryStore,
  filePath: string,
  source: MetadataSource,
): Promise<ImportResult> {
  const absolutePath = resolve(filePath);
  if (!bookTypeFromPath(absolutePath)) {
    throw LibraryErrors.unsupportedFormat(extname(absolutePath).replace(/^\./, ""), absolutePath);
  }

  const existing = store.findBookByPath(absolutePath);
  if (existing) {
    return { status: "duplicate", book: existing };
  }

  const metadata = await source.extract(absolutePath);
  const book = bookFromMetadata(absolutePath, metadata);
  store.insertBook(book);
  return { status: "imported", book };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function fileStem(filePath: string): string {
  const name = basename(filePath, extname(filePath));
  return name || basename(filePath);
}
