export type AppErrorSeverity = "info" | "warn" | "error";

export interface AppErrorMetadata {
  code?: string;
  source?: string;
  cause?: unknown;
  severity?: AppErrorSeverity;
  userMessage?: string;
}

export class AppError extends Error {
  readonly code?: string;
  readonly source?: string;
  readonly severity: AppErrorSeverity;
  readonly userMessage?: string;

  constructor(message: string, metadata: AppErrorMetadata = {}) {
    super(message, metadata.cause === undefined ? undefined : { cause: metadata.cause });
    this.name = "AppError";
    this.code = metadata.code;
    this.source = metadata.source;
    this.severity = metadata.severity ?? "error";
    this.userMessage = metadata.userMessage;
  }
}

export function isAppError(input: unknown): input is AppError {
  return input instanceof AppError;
}

/**
 * Closed set of failure kinds shared by the library entities, the store and
 * the metadata readers that feed it.
 */
export type LibraryErrorKind =
  | "database"
  | "file_not_found"
  | "unsupported_format"
  | "parse_error"
  | "io_error";

const KIND_PREFIX: Record<LibraryErrorKind, string> = {
  database: "Database error",
  file_not_found: "File not found",
  unsupported_format: "Unsupported format",
  parse_error: "Parse error",
  io_error: "IO error",
};

export class LibraryError extends AppError {
  readonly kind: LibraryErrorKind;
  readonly detail: string;

  constructor(kind: LibraryErrorKind, detail: string, metadata: AppErrorMetadata = {}) {
    super(`${KIND_PREFIX[kind]}: ${detail}`, metadata);
    this.name = "LibraryError";
    this.kind = kind;
    this.detail = detail;
  }
}

export const LibraryErrors = {
  database(message: string, metadata: Omit<AppErrorMetadata, "severity"> = {}) {
    return new LibraryError("database", message, metadata);
  },

  fileNotFound(path: string, cause?: unknown) {
    return new LibraryError("file_not_found", path, {
      code: "FILE_NOT_FOUND",
      source: path,
      cause,
      userMessage: "The selected file no longer exists.",
    });
  },

  unsupportedFormat(extension: string, source?: string) {
    return new LibraryError("unsupported_format", extension || "(none)", {
      code: "UNSUPPORTED_FORMAT",
      source,
      userMessage: "Only PDF and EPUB files can be added to the library.",
    });
  },

  parse(message: string, metadata: Omit<AppErrorMetadata, "severity"> = {}) {
    return new LibraryError("parse_error", message, metadata);
  },

  io(message: string, metadata: Omit<AppErrorMetadata, "severity"> = {}) {
    return new LibraryError("io_error", message, metadata);
  },
};

export function isLibraryError(input: unknown, kind?: LibraryErrorKind): input is LibraryError {
  if (!(input instanceof LibraryError)) return false;
  return kind === undefined || input.kind === kind;
}
