export type BookType = "pdf" | "epub";

export type AnnotationType = "highlight" | "note";

export type HighlightColor = "yellow" | "green" | "blue" | "pink" | "orange";

/** Seconds since the Unix epoch. */
export type UnixSeconds = number;

export interface Book {
  id: string;
  title: string;
  author?: string;
  /** Absolute path; unique across the library. */
  filePath: string;
  fileType: BookType;
  coverData?: Uint8Array;
  addedAt: UnixSeconds;
  lastReadAt?: UnixSeconds;
  /** Pages for PDF, spine chapters for EPUB. */
  totalPages: number;
}

export interface Annotation {
  id: string;
  bookId: string;
  annotationType: AnnotationType;
  startPercent: number;
  endPercent: number;
  /** Display hint only; ordering uses startPercent. */
  pageNumber: number;
  /** Hex string from the highlight palette. */
  color: string;
  selectedText?: string;
  noteText?: string;
  createdAt: UnixSeconds;
}

export interface ReadingPosition {
  bookId: string;
  percent: number;
  pageNumber: number;
  updatedAt: UnixSeconds;
}

/**
 * What a document parser hands to the library when a file is added. How it was
 * produced (OPF metadata, PDF info dictionary, a filename) is not the store's
 * concern.
 */
export interface BookMetadata {
  title?: string;
  author?: string;
  coverData?: Uint8Array;
  totalPages: number;
}

export interface NewBookInput {
  title: string;
  author?: string;
  filePath: string;
  fileType: BookType;
  totalPages: number;
}

export interface NewHighlightInput {
  bookId: string;
  startPercent: number;
  endPercent: number;
  pageNumber: number;
  color: HighlightColor;
  selectedText?: string;
}

export interface NewNoteInput {
  bookId: string;
  startPercent: number;
  pageNumber: number;
  noteText: string;
}

export interface NewReadingPositionInput {
  bookId: string;
  percent: number;
  pageNumber: number;
}

export type LibraryEvents = {
  "book:added": { book: Book };
  "book:deleted": { bookId: string };
  "book:opened": { bookId: string; lastReadAt: UnixSeconds };
  "annotation:added": { annotation: Annotation };
  "annotation:deleted": { annotationId: string };
  "position:saved": { position: ReadingPosition };
};
