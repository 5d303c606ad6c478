import { randomUUID } from "node:crypto";
import { extname } from "node:path";
import type {
  Annotation,
  AnnotationType,
  Book,
  BookType,
  HighlightColor,
  NewBookInput,
  NewHighlightInput,
  NewNoteInput,
  NewReadingPositionInput,
  ReadingPosition,
  UnixSeconds,
} from "./types";

const BOOK_TYPE_EXTENSIONS: Record<BookType, string> = {
  pdf: "pdf",
  epub: "epub",
};

const ANNOTATION_TYPE_TOKENS: Record<AnnotationType, string> = {
  highlight: "highlight",
  note: "note",
};

/** Declaration order is the palette order; the first entry is the default note color. */
export const HIGHLIGHT_COLORS: readonly HighlightColor[] = ["yellow", "green", "blue", "pink", "orange"];

const HIGHLIGHT_COLOR_HEX: Record<HighlightColor, string> = {
  yellow: "#FFEB3B",
  green: "#4CAF50",
  blue: "#2196F3",
  pink: "#E91E63",
  orange: "#FF9800",
};

export const DEFAULT_NOTE_COLOR: HighlightColor = "yellow";

export function nowSeconds(): UnixSeconds {
  return Math.floor(Date.now() / 1000);
}

export function bookTypeExtension(type: BookType): string {
  return BOOK_TYPE_EXTENSIONS[type];
}

/** Accepts "epub", ".EPUB" and the like. */
export function bookTypeFromExtension(extension: string): BookType | undefined {
  const normalized = extension.trim().replace(/^\./, "").toLowerCase();
  return lookupKey(BOOK_TYPE_EXTENSIONS, normalized);
}

export function bookTypeFromPath(filePath: string): BookType | undefined {
  return bookTypeFromExtension(extname(filePath));
}

export function annotationTypeToken(type: AnnotationType): string {
  return ANNOTATION_TYPE_TOKENS[type];
}

export function annotationTypeFromToken(token: string): AnnotationType | undefined {
  return lookupKey(ANNOTATION_TYPE_TOKENS, token);
}

export function highlightColorHex(color: HighlightColor): string {
  return HIGHLIGHT_COLOR_HEX[color];
}

export function highlightColorFromHex(hex: string): HighlightColor | undefined {
  return lookupKey(HIGHLIGHT_COLOR_HEX, hex.trim().toUpperCase());
}

export function createBook(input: NewBookInput): Book {
  return {
    id: randomUUID(),
    title: input.title,
    author: input.author,
    filePath: input.filePath,
    fileType: input.fileType,
    coverData: undefined,
    addedAt: nowSeconds(),
    lastReadAt: undefined,
    totalPages: toCount(input.totalPages),
  };
}

export function createHighlight(input: NewHighlightInput): Annotation {
  const start = clampPercent(input.startPercent);
  const end = clampPercent(input.endPercent);
  return {
    id: randomUUID(),
    bookId: input.bookId,
    annotationType: "highlight",
    startPercent: Math.min(start, end),
    endPercent: Math.max(start, end),
    pageNumber: toCount(input.pageNumber),
    color: highlightColorHex(input.color),
    selectedText: input.selectedText,
    noteText: undefined,
    createdAt: nowSeconds(),
  };
}

export function createNote(input: NewNoteInput): Annotation {
  const start = clampPercent(input.startPercent);
  return {
    id: randomUUID(),
    bookId: input.bookId,
    annotationType: "note",
    startPercent: start,
    endPercent: start,
    pageNumber: toCount(input.pageNumber),
    color: highlightColorHex(DEFAULT_NOTE_COLOR),
    selectedText: undefined,
    noteText: input.noteText,
    createdAt: nowSeconds(),
  };
}

export function createReadingPosition(input: NewReadingPositionInput): ReadingPosition {
  return {
    bookId: input.bookId,
    percent: clampPercent(input.percent),
    pageNumber: toCount(input.pageNumber),
    updatedAt: nowSeconds(),
  };
}

/** Clamps to [0, 100]; NaN becomes 0. */
export function clampPercent(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function toCount(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

function lookupKey<Key extends string>(table: Record<Key, string>, token: string): Key | undefined {
  for (const [key, value] of Object.entries<string>(table)) {
    if (value === token && isKeyOf(table, key)) {
      return key;
    }
  }
  return undefined;
}

function isKeyOf<Key extends string>(table: Record<Key, string>, key: string): key is Key {
  return Object.prototype.hasOwnProperty.call(table, key);
}
