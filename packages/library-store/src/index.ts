import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { EventBus, LibraryErrors } from "@marginalia/core-platform";
import { nowSeconds } from "./models";
import { IN_MEMORY_PATH, SerializedConnection, type ConnectionOptions } from "./storage/connection";
import {
  ANNOTATION_COLUMNS,
  BOOK_COLUMNS,
  READING_POSITION_COLUMNS,
  annotationToRow,
  bookToRow,
  positionToRow,
  rowToAnnotation,
  rowToBook,
  rowToPosition,
  type AnnotationRow,
  type BookRow,
  type ReadingPositionRow,
} from "./storage/rows";
import type { Annotation, Book, LibraryEvents, ReadingPosition, UnixSeconds } from "./types";

export const DEFAULT_LIBRARY_PATH = "./data/library.db";

export interface LibraryStoreOptions extends ConnectionOptions {
  /** Source of "now" for `updateLastRead`. */
  clock?: () => UnixSeconds;
}

/**
 * The library database: books, their annotations and one reading position per
 * book. All calls are synchronous and go through a single connection, so each
 * operation observes every operation issued before it.
 */
export class LibraryStore {
  private readonly events = new EventBus<LibraryEvents>({
    onHandlerError: (event, error) => {
      console.warn(`[library-store] "${event}" listener failed`, error);
    },
  });
  private readonly clock: () => UnixSeconds;

  private constructor(
    private readonly connection: SerializedConnection,
    options: LibraryStoreOptions,
  ) {
    this.clock = options.clock ?? nowSeconds;
  }

  static open(path: string, options: LibraryStoreOptions = {}): LibraryStore {
    return new LibraryStore(SerializedConnection.open(path, options), options);
  }

  static openInMemory(options: LibraryStoreOptions = {}): LibraryStore {
    return LibraryStore.open(IN_MEMORY_PATH, options);
  }

  on = this.events.on.bind(this.events);
  off = this.events.off.bind(this.events);

  get path(): string {
    return this.connection.path;
  }

  get isOpen(): boolean {
    return this.connection.isOpen;
  }

  close() {
    this.connection.close();
  }

  // Books

  /** Fails with a database error when another book already uses `filePath`. */
  insertBook(book: Book) {
    this.connection.run("insertBook", db => {
      db.prepare<BookRow>(
        `INSERT INTO books (${BOOK_COLUMNS})
         VALUES (@id, @title, @author, @file_path, @file_type, @cover_data, @added_at, @last_read_at, @total_pages)`,
      ).run(bookToRow(book));
    });
    this.events.emit("book:added", { book: cloneBook(book) });
  }

  /** Most recently added first. */
  getAllBooks(): Book[] {
    return this.connection.run("getAllBooks", db =>
      db
        .prepare<[], BookRow>(`SELECT ${BOOK_COLUMNS} FROM books ORDER BY added_at DESC, rowid DESC`)
        .all()
        .map(rowToBook),
    );
  }

  getBook(id: string): Book | undefined {
    const row = this.connection.run("getBook", db =>
      db.prepare<[string], BookRow>(`SELECT ${BOOK_COLUMNS} FROM books WHERE id = ?`).get(id),
    );
    return row ? rowToBook(row) : undefined;
  }

  findBookByPath(filePath: string): Book | undefined {
    const row = this.connection.run("findBookByPath", db =>
      db.prepare<[string], BookRow>(`SELECT ${BOOK_COLUMNS} FROM books WHERE file_path = ?`).get(filePath),
    );
    return row ? rowToBook(row) : undefined;
  }

  bookExistsByPath(filePath: string): boolean {
    return this.connection.run("bookExistsByPath", db => {
      const row = db
        .prepare<[string], { found: number }>("SELECT EXISTS(SELECT 1 FROM books WHERE file_path = ?) AS found")
        .get(filePath);
      return row?.found === 1;
    });
  }

  /**
   * Removes the book together with its annotations and reading position.
   * Returns false when no book had this id.
   */
  deleteBook(id: string): boolean {
    const removed = this.connection.transaction("deleteBook", db => {
      const result = db.prepare<[string]>("DELETE FROM books WHERE id = ?").run(id);
      return result.changes > 0;
    });
    if (removed) {
      this.events.emit("book:deleted", { bookId: id });
    }
    return removed;
  }

  /** Stamps `lastReadAt` with the current time; unknown ids are ignored. */
  updateLastRead(id: string): boolean {
    const lastReadAt = this.clock();
    const updated = this.connection.run("updateLastRead", db => {
      const result = db
        .prepare<[number, string]>("UPDATE books SET last_read_at = ? WHERE id = ?")
        .run(lastReadAt, id);
      return result.changes > 0;
    });
    if (updated) {
      this.events.emit("book:opened", { bookId: id, lastReadAt });
    }
    return updated;
  }

  // Annotations

  /** Fails with a database error when `bookId` does not name a stored book. */
  insertAnnotation(annotation: Annotation) {
    this.connection.run("insertAnnotation", db => {
      db.prepare<AnnotationRow>(
        `INSERT INTO annotations (${ANNOTATION_COLUMNS})
         VALUES (@id, @book_id, @annotation_type, @start_percent, @end_percent, @page_number, @color,
                 @selected_text, @note_text, @created_at)`,
      ).run(annotationToRow(annotation));
    });
    this.events.emit("annotation:added", { annotation: { ...annotation } });
  }

  /** Ordered by position in the book, earliest first. */
  getAnnotations(bookId: string): Annotation[] {
    return this.connection.run("getAnnotations", db =>
      db
        .prepare<[string], AnnotationRow>(
          `SELECT ${ANNOTATION_COLUMNS} FROM annotations
           WHERE book_id = ?
           ORDER BY start_percent ASC, created_at ASC, id ASC`,
        )
        .all(bookId)
        .map(rowToAnnotation),
    );
  }

  deleteAnnotation(id: string): boolean {
    const removed = this.connection.run("deleteAnnotation", db => {
      const result = db.prepare<[string]>("DELETE FROM annotations WHERE id = ?").run(id);
      return result.changes > 0;
    });
    if (removed) {
      this.events.emit("annotation:deleted", { annotationId: id });
    }
    return removed;
  }

  // Reading positions

  /** Inserts the book's position or overwrites the one already stored. */
  saveReadingPosition(position: ReadingPosition) {
    this.connection.run("saveReadingPosition", db => {
      db.prepare<ReadingPositionRow>(
        `INSERT INTO reading_positions (${READING_POSITION_COLUMNS})
         VALUES (@book_id, @percent, @page_number, @updated_at)
         ON CONFLICT(book_id) DO UPDATE SET
           percent = excluded.percent,
           page_number = excluded.page_number,
           updated_at = excluded.updated_at`,
      ).run(positionToRow(position));
    });
    this.events.emit("position:saved", { position: { ...position } });
  }

  getReadingPosition(bookId: string): ReadingPosition | undefined {
    const row = this.connection.run("getReadingPosition", db =>
      db
        .prepare<[string], ReadingPositionRow>(
          `SELECT ${READING_POSITION_COLUMNS} FROM reading_positions WHERE book_id = ?`,
        )
        .get(bookId),
    );
    return row ? rowToPosition(row) : undefined;
  }
}

export interface CreateLibraryStoreOptions extends LibraryStoreOptions {
  /** Defaults to `LIBRARY_DB_PATH`, then `./data/library.db`. */
  path?: string;
}

export function createLibraryStore(options: CreateLibraryStoreOptions = {}): LibraryStore {
  const { path, ...storeOptions } = options;
  const target = path ?? process.env.LIBRARY_DB_PATH ?? DEFAULT_LIBRARY_PATH;

  if (target === IN_MEMORY_PATH) {
    return LibraryStore.openInMemory(storeOptions);
  }

  const absolute = resolve(target);
  try {
    mkdirSync(dirname(absolute), { recursive: true });
  } catch (error) {
    throw LibraryErrors.io(`cannot create library directory ${dirname(absolute)}`, {
      code: "LIBRARY_DIR_UNAVAILABLE",
      source: absolute,
      cause: error,
    });
  }
  return LibraryStore.open(absolute, storeOptions);
}

function cloneBook(book: Book): Book {
  return { ...book, coverData: book.coverData ? new Uint8Array(book.coverData) : undefined };
}

export {
  DEFAULT_NOTE_COLOR,
  HIGHLIGHT_COLORS,
  annotationTypeFromToken,
  annotationTypeToken,
  bookTypeExtension,
  bookTypeFromExtension,
  bookTypeFromPath,
  clampPercent,
  createBook,
  createHighlight,
  createNote,
  createReadingPosition,
  highlightColorFromHex,
  highlightColorHex,
  nowSeconds,
} from "./models";
export { bookFromMetadata, importBook } from "./ingest";
export type { ImportResult, MetadataSource } from "./ingest";
export type { ConnectionOptions } from "./storage/connection";
export type * from "./types";
