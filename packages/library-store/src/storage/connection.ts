import Database from "better-sqlite3";
import { LibraryError, LibraryErrors } from "@marginalia/core-platform";
import { SCHEMA_SQL } from "./schema";

type Connection = Database.Database;

export const IN_MEMORY_PATH = ":memory:";

export interface ConnectionOptions {
  /** Milliseconds SQLite waits on a locked database file before failing. */
  busyTimeoutMs?: number;
}

/**
 * Owns the single SQLite connection behind a store. Every operation enters
 * through `run` or `transaction`, which hold the connection exclusively for
 * the duration of the call.
 */
export class SerializedConnection {
  private held?: string;
  private closed = false;

  private constructor(
    private readonly db: Connection,
    readonly path: string,
  ) {}

  static open(path: string, options: ConnectionOptions = {}): SerializedConnection {
    let db: Connection;
    try {
      db = new Database(path, { timeout: options.busyTimeoutMs ?? 5000 });
    } catch (error) {
      throw classifyStorageError(error, "open", path);
    }

    const connection = new SerializedConnection(db, path);
    connection.run("initialize", conn => {
      conn.pragma("foreign_keys = ON");
      if (path !== IN_MEMORY_PATH) {
        conn.pragma("journal_mode = WAL");
      }
      conn.exec(SCHEMA_SQL);
    });
    return connection;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  run<T>(operation: string, work: (db: Connection) => T): T {
    if (this.closed) {
      throw LibraryErrors.database(`store is closed (${operation})`, {
        code: "STORE_CLOSED",
        source: this.path,
      });
    }
    if (this.held) {
      throw LibraryErrors.database(`"${operation}" issued while "${this.held}" holds the connection`, {
        code: "STORE_BUSY",
        source: this.path,
      });
    }

    this.held = operation;
    try {
      return work(this.db);
    } catch (error) {
      throw classifyStorageError(error, operation, this.path);
    } finally {
      this.held = undefined;
    }
  }

  /** Runs `work` inside BEGIN/COMMIT; any throw rolls the whole unit back. */
  transaction<T>(operation: string, work: (db: Connection) => T): T {
    return this.run(operation, db => db.transaction(() => work(db))());
  }

  close() {
    if (this.closed) return;
    this.run("close", db => db.close());
    this.closed = true;
  }
}

export function classifyStorageError(error: unknown, operation: string, path: string): LibraryError {
  if (error instanceof LibraryError) {
    return error;
  }
  if (error instanceof Database.SqliteError) {
    return LibraryErrors.database(`${operation} failed: ${error.message}`, {
      code: error.code,
      source: path,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return LibraryErrors.database(`${operation} failed: ${message}`, {
    code: "SQLITE_UNKNOWN",
    source: path,
    cause: error,
  });
}
