import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { LibraryErrors, isLibraryError, type LibraryError } from "@marginalia/core-platform";
import { bookTypeFromPath, type BookMetadata, type BookType, type MetadataSource } from "@marginalia/library-store";
import { readEpubMetadata } from "./epub";
import { readPdfMetadata } from "./pdf";

type MetadataReader = (data: Uint8Array, source: string) => BookMetadata | Promise<BookMetadata>;

const READERS: Record<BookType, MetadataReader> = {
  pdf: readPdfMetadata,
  epub: readEpubMetadata,
};

/**
 * Reads the metadata the library needs from a PDF or EPUB on disk.
 * Throws `file_not_found`, `io_error`, `unsupported_format` or `parse_error`.
 */
export async function extractMetadata(filePath: string): Promise<BookMetadata> {
  const fileType = bookTypeFromPath(filePath);

  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw LibraryErrors.io(`${filePath} is not a regular file`, { code: "NOT_A_FILE", source: filePath });
    }
  } catch (error) {
    throw classifyFsError(error, filePath);
  }

  if (!fileType) {
    throw LibraryErrors.unsupportedFormat(extname(filePath).replace(/^\./, ""), filePath);
  }

  let data: Uint8Array;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw classifyFsError(error, filePath);
  }

  return await READERS[fileType](data, filePath);
}

export const metadataSource: MetadataSource = {
  extract: extractMetadata,
};

function classifyFsError(error: unknown, filePath: string): LibraryError {
  if (isLibraryError(error)) {
    return error;
  }
  const code = error instanceof Error && "code" in error ? String(error.code) : undefined;
  if (code === "ENOENT" || code === "ENOTDIR") {
    return LibraryErrors.fileNotFound(filePath, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return LibraryErrors.io(`${filePath}: ${message}`, { code, source: filePath, cause: error });
}

export { readEpubMetadata } from "./epub";
export { readPdfMetadata } from "./pdf";
