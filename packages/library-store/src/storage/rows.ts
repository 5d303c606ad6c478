import { LibraryErrors } from "@marginalia/core-platform";
import { annotationTypeFromToken, annotationTypeToken, bookTypeExtension, bookTypeFromExtension } from "../models";
import type { Annotation, Book, ReadingPosition } from "../types";

export interface BookRow {
  id: string;
  title: string;
  author: string | null;
  file_path: string;
  file_type: string;
  cover_data: Buffer | null;
  added_at: number;
  last_read_at: number | null;
  total_pages: number;
}

export interface AnnotationRow {
  id: string;
  book_id: string;
  annotation_type: string;
  start_percent: number;
  end_percent: number;
  page_number: number;
  color: string;
  selected_text: string | null;
  note_text: string | null;
  created_at: number;
}

export interface ReadingPositionRow {
  book_id: string;
  percent: number;
  page_number: number;
  updated_at: number;
}

export const BOOK_COLUMNS =
  "id, title, author, file_path, file_type, cover_data, added_at, last_read_at, total_pages";

export const ANNOTATION_COLUMNS =
  "id, book_id, annotation_type, start_percent, end_percent, page_number, color, selected_text, note_text, created_at";

export const READING_POSITION_COLUMNS = "book_id, percent, page_number, updated_at";

export function bookToRow(book: Book): BookRow {
  return {
    id: book.id,
    title: book.title,
    author: book.author ?? null,
    file_path: book.filePath,
    file_type: bookTypeExtension(book.fileType),
    cover_data: book.coverData ? Buffer.from(book.coverData) : null,
    added_at: book.addedAt,
    last_read_at: book.lastReadAt ?? null,
    total_pages: book.totalPages,
  };
}

export function rowToBook(row: BookRow): Book {
  const fileType = bookTypeFromExtension(row.file_type);
  if (!fileType) {
    throw corruptRow("books", row.id, `file_type "${row.file_type}"`);
  }
  return {
    id: row.id,
    title: row.title,
    author: row.author ?? undefined,
    filePath: row.file_path,
    fileType,
    // Copy out of the driver's buffer so callers never share memory with it.
    coverData: row.cover_data ? new Uint8Array(row.cover_data) : undefined,
    addedAt: row.added_at,
    lastReadAt: row.last_read_at ?? undefined,
    totalPages: row.total_pages,
  };
}

export function annotationToRow(annotation: Annotation): AnnotationRow {
  return {
    id: annotation.id,
    book_id: annotation.bookId,
    annotation_type: annotationTypeToken(annotation.annotationType),
    start_percent: annotation.startPercent,
    end_percent: annotation.endPercent,
    page_number: annotation.pageNumber,
    color: annotation.color,
    selected_text: annotation.selectedText ?? null,
    note_text: annotation.noteText ?? null,
    created_at: annotation.createdAt,
  };
}

export function rowToAnnotation(row: AnnotationRow): Annotation {
  const annotationType = annotationTypeFromToken(row.annotation_type);
  if (!annotationType) {
    throw corruptRow("annotations", row.id, `annotation_type "${row.annotation_type}"`);
  }
  return {
    id: row.id,
    bookId: row.book_id,
    annotationType,
    startPercent: row.start_percent,
    endPercent: row.end_percent,
    pageNumber: row.page_number,
    color: row.color,
    selectedText: row.selected_text ?? undefined,
    noteText: row.note_text ?? undefined,
    createdAt: row.created_at,
  };
}

export function positionToRow(position: ReadingPosition): ReadingPositionRow {
  return {
    book_id: position.bookId,
    percent: position.percent,
    page_number: position.pageNumber,
    updated_at: position.updatedAt,
  };
}

export function rowToPosition(row: ReadingPositionRow): ReadingPosition {
  return {
    bookId: row.book_id,
    percent: row.percent,
    pageNumber: row.page_number,
    updatedAt: row.updated_at,
  };
}

function corruptRow(table: string, id: string, detail: string) {
  return LibraryErrors.database(`unrecognized ${detail} in ${table} row ${id}`, {
    code: "CORRUPT_ROW",
    source: table,
  });
}
