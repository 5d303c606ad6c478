import { LibraryErrors } from "@marginalia/core-platform";
import type { BookMetadata } from "@marginalia/library-store";
import { VerbosityLevel, getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

/**
 * Page count plus the Title and Author entries of the trailer's document
 * information dictionary.
 */
export async function readPdfMetadata(data: Uint8Array, source = "pdf"): Promise<BookMetadata> {
  // pdf.js takes ownership of the buffer it is given.
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    verbosity: VerbosityLevel.ERRORS,
  });

  try {
    const document = await loadingTask.promise;
    const { info } = await document.getMetadata();
    return {
      title: infoString(info, "Title"),
      author: infoString(info, "Author"),
      totalPages: document.numPages,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw LibraryErrors.parse(`cannot read PDF: ${message}`, { code: "PDF_UNREADABLE", source, cause: error });
  } finally {
    await loadingTask.destroy();
  }
}

function infoString(info: unknown, key: string): string | undefined {
  if (typeof info !== "object" || info === null) return undefined;
  const value = new Map<string, unknown>(Object.entries(info)).get(key);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}
