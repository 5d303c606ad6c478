import { metadataSource } from "@marginalia/book-metadata";
import { isLibraryError } from "@marginalia/core-platform";
import {
  createLibraryStore,
  importBook,
  type Book,
  type ImportResult,
  type LibraryStore,
  type MetadataSource,
} from "@marginalia/library-store";

export interface LibraryBootstrapOptions {
  /** Library database; falls back to LIBRARY_DB_PATH. */
  dbPath?: string;
  files?: string[];
  source?: MetadataSource;
}

export interface ImportFailure {
  filePath: string;
  error: Error;
}

export interface LibraryBootstrap {
  store: LibraryStore;
  imported: ImportResult[];
  failed: ImportFailure[];
  books: Book[];
}

/**
 * Opens the library and adds each file to it. A file that cannot be added is
 * reported in `failed` and does not stop the others; storage failures are
 * rethrown after the store is closed.
 */
export async function bootstrapLibrary(options: LibraryBootstrapOptions = {}): Promise<LibraryBootstrap> {
  const store = createLibraryStore({ path: options.dbPath });
  const source = options.source ?? metadataSource;
  const imported: ImportResult[] = [];
  const failed: ImportFailure[] = [];

  try {
    for (const filePath of options.files ?? []) {
      try {
        imported.push(await importBook(store, filePath, source));
      } catch (error) {
        if (isLibraryError(error) && error.kind !== "database") {
          failed.push({ filePath, error });
          continue;
        }
        throw error;
      }
    }
    return { store, imported, failed, books: store.getAllBooks() };
  } catch (error) {
    store.close();
    throw error;
  }
}
