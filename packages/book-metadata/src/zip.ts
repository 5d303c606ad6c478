import { inflateRawSync } from "node:zlib";
import { LibraryErrors } from "@marginalia/core-platform";

const END_OF_CENTRAL_DIRECTORY = 0x06054b50;
const CENTRAL_FILE_HEADER = 0x02014b50;
const LOCAL_FILE_HEADER = 0x04034b50;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

interface ZipEntry {
  method: number;
  compressedSize: number;
  localHeaderOffset: number;
}

/** Read-only view over an in-memory ZIP container (the EPUB OCF). */
export class ZipArchive {
  private readonly view: DataView;
  private readonly entries: Map<string, ZipEntry>;
  private readonly decoder = new TextDecoder("utf-8");

  constructor(
    private readonly data: Uint8Array,
    private readonly source = "archive",
  ) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.entries = this.readCentralDirectory();
  }

  has(path: string): boolean {
    return this.entries.has(normalizeEntryPath(path));
  }

  text(path: string): string | undefined {
    const bytes = this.bytes(path);
    return bytes ? this.decoder.decode(bytes) : undefined;
  }

  bytes(path: string): Uint8Array | undefined {
    const entry = this.entries.get(normalizeEntryPath(path));
    if (!entry) return undefined;

    const offset = entry.localHeaderOffset;
    if (offset + 30 > this.data.byteLength || this.view.getUint32(offset, true) !== LOCAL_FILE_HEADER) {
      throw this.corrupt(`bad local header for ${path}`);
    }

    const nameLength = this.view.getUint16(offset + 26, true);
    const extraLength = this.view.getUint16(offset + 28, true);
    const start = offset + 30 + nameLength + extraLength;
    const payload = this.data.subarray(start, start + entry.compressedSize);

    if (entry.method === METHOD_STORED) {
      return new Uint8Array(payload);
    }
    if (entry.method === METHOD_DEFLATE) {
      try {
        return new Uint8Array(inflateRawSync(payload));
      } catch (error) {
        throw this.corrupt(`cannot inflate ${path}`, error);
      }
    }
    throw this.corrupt(`unsupported compression method ${entry.method} for ${path}`);
  }

  private readCentralDirectory(): Map<string, ZipEntry> {
    const end = this.findEndOfCentralDirectory();
    if (end < 0) {
      throw this.corrupt("not a ZIP container");
    }

    const count = this.view.getUint16(end + 10, true);
    let offset = this.view.getUint32(end + 16, true);
    const entries = new Map<string, ZipEntry>();

    for (let i = 0; i < count; i += 1) {
      if (offset + 46 > this.data.byteLength || this.view.getUint32(offset, true) !== CENTRAL_FILE_HEADER) {
        throw this.corrupt(`bad central directory record at ${offset}`);
      }

      const nameLength = this.view.getUint16(offset + 28, true);
      const extraLength = this.view.getUint16(offset + 30, true);
      const commentLength = this.view.getUint16(offset + 32, true);
      const nameStart = offset + 46;
      const name = this.decoder.decode(this.data.subarray(nameStart, nameStart + nameLength));

      entries.set(normalizeEntryPath(name), {
        method: this.view.getUint16(offset + 10, true),
        compressedSize: this.view.getUint32(offset + 20, true),
        localHeaderOffset: this.view.getUint32(offset + 42, true),
      });

      offset = nameStart + nameLength + extraLength + commentLength;
    }

    return entries;
  }

  private findEndOfCentralDirectory(): number {
    // The record is 22 bytes plus a comment of at most 64 KiB.
    const lowest = Math.max(0, this.data.byteLength - 22 - 0xffff);
    for (let offset = this.data.byteLength - 22; offset >= lowest; offset -= 1) {
      if (this.view.getUint32(offset, true) === END_OF_CENTRAL_DIRECTORY) {
        return offset;
      }
    }
    return -1;
  }

  private corrupt(message: string, cause?: unknown) {
    return LibraryErrors.parse(message, { code: "ZIP_CORRUPT", source: this.source, cause });
  }
}

export function normalizeEntryPath(path: string): string {
  return path.replace(/\\/g, "/").replace(/^(\.\/|\/)+/, "");
}
