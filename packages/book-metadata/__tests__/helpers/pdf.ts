import { deflateSync } from "node:zlib";

export interface PdfFixtureOptions {
  title?: string;
  author?: string;
  pages?: number;
  /** Titles of top-level bookmarks, each pointing at the first page. */
  outline?: string[];
}

const PAGE = "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>";

function latin1(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

function indirect(id: number, dict: string, stream?: Buffer): Buffer {
  if (!stream) return latin1(`${id} 0 obj\n${dict}\nendobj\n`);
  return Buffer.concat([latin1(`${id} 0 obj\n${dict}\nstream\n`), stream, latin1("\nendstream\nendobj\n")]);
}

function infoDict(options: PdfFixtureOptions): string {
  const entries = ["/Producer (marginalia fixtures)"];
  if (options.title !== undefined) entries.push(`/Title (${options.title})`);
  if (options.author !== undefined) entries.push(`/Author (${options.author})`);
  return `<< ${entries.join(" ")} >>`;
}

function pageIds(first: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => first + i);
}

/** Objects numbered from 1 in order, followed by a classic xref table. */
function writeClassicPdf(objects: string[], trailer: string): Uint8Array {
  const header = latin1("%PDF-1.4\n");
  const chunks: Buffer[] = [header];
  const offsets: number[] = [];
  let offset = header.length;
  objects.forEach((dict, index) => {
    const chunk = indirect(index + 1, dict);
    offsets.push(offset);
    chunks.push(chunk);
    offset += chunk.length;
  });

  const rows = offsets.map((value) => `${String(value).padStart(10, "0")} 00000 n \n`).join("");
  chunks.push(
    latin1(
      `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${rows}` +
        `trailer\n<< /Size ${objects.length + 1} ${trailer} >>\nstartxref\n${offset}\n%%EOF\n`,
    ),
  );
  return new Uint8Array(Buffer.concat(chunks));
}

/** A plain PDF 1.4 file: catalog, page tree, optional bookmarks, info dictionary. */
export function buildPdf(options: PdfFixtureOptions = {}): Uint8Array {
  const pages = pageIds(3, options.pages ?? 1);
  const outline = options.outline ?? [];
  const outlinesId = 3 + pages.length;
  const itemIds = pageIds(outlinesId + 1, outline.length);
  const infoId = outline.length > 0 ? outlinesId + 1 + outline.length : outlinesId;

  const objects = [
    outline.length > 0
      ? `<< /Type /Catalog /Pages 2 0 R /Outlines ${outlinesId} 0 R >>`
      : "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pages.map((id) => `${id} 0 R`).join(" ")}] /Count ${pages.length} >>`,
    ...pages.map(() => PAGE),
  ];
  if (outline.length > 0) {
    objects.push(
      `<< /Type /Outlines /First ${itemIds[0]} 0 R /Last ${itemIds[itemIds.length - 1]} 0 R /Count ${outline.length} >>`,
    );
    outline.forEach((title, index) => {
      const links = [
        index > 0 ? `/Prev ${itemIds[index - 1]} 0 R` : "",
        index < outline.length - 1 ? `/Next ${itemIds[index + 1]} 0 R` : "",
      ].join(" ");
      objects.push(`<< /Title (${title}) /Parent ${outlinesId} 0 R ${links} /Dest [${pages[0]} 0 R /Fit] >>`);
    });
  }
  objects.push(infoDict(options));

  return writeClassicPdf(objects, `/Root 1 0 R /Info ${infoId} 0 R`);
}

/**
 * A PDF 1.5 file whose page tree lives in a compressed object stream and
 * whose cross-reference data is itself a stream, as most modern writers emit.
 */
export function buildObjectStreamPdf(options: PdfFixtureOptions = {}): Uint8Array {
  const pages = pageIds(3, options.pages ?? 1);
  const compressed = [
    `<< /Type /Pages /Kids [${pages.map((id) => `${id} 0 R`).join(" ")}] /Count ${pages.length} >>`,
    ...pages.map(() => PAGE),
  ];
  const infoId = 3 + pages.length;
  const objStmId = infoId + 1;
  const xrefId = objStmId + 1;

  const bodies: string[] = [];
  const pairs: string[] = [];
  let bodyOffset = 0;
  compressed.forEach((dict, index) => {
    pairs.push(`${index + 2} ${bodyOffset}`);
    bodies.push(`${dict}\n`);
    bodyOffset += dict.length + 1;
  });
  const objStmHeader = `${pairs.join(" ")}\n`;
  const objStmData = deflateSync(latin1(objStmHeader + bodies.join("")));

  const header = latin1("%PDF-1.5\n");
  const catalog = indirect(1, "<< /Type /Catalog /Pages 2 0 R >>");
  const info = indirect(infoId, infoDict(options));
  const objStm = indirect(
    objStmId,
    `<< /Type /ObjStm /N ${compressed.length} /First ${objStmHeader.length} /Filter /FlateDecode /Length ${objStmData.length} >>`,
    objStmData,
  );

  const catalogOffset = header.length;
  const infoOffset = catalogOffset + catalog.length;
  const objStmOffset = infoOffset + info.length;
  const xrefOffset = objStmOffset + objStm.length;

  // W [1 4 2]: type, offset or object-stream number, generation or index.
  const size = xrefId + 1;
  const rows = Buffer.alloc(size * 7);
  const row = (id: number, type: number, field2: number, field3: number): void => {
    rows.writeUInt8(type, id * 7);
    rows.writeUInt32BE(field2, id * 7 + 1);
    rows.writeUInt16BE(field3, id * 7 + 5);
  };
  row(0, 0, 0, 65535);
  row(1, 1, catalogOffset, 0);
  compressed.forEach((_, index) => row(index + 2, 2, objStmId, index));
  row(infoId, 1, infoOffset, 0);
  row(objStmId, 1, objStmOffset, 0);
  row(xrefId, 1, xrefOffset, 0);
  const xref = indirect(
    xrefId,
    `<< /Type /XRef /Size ${size} /W [1 4 2] /Root 1 0 R /Info ${infoId} 0 R /Length ${rows.length} >>`,
    rows,
  );

  return new Uint8Array(
    Buffer.concat([header, catalog, info, objStm, xref, latin1(`startxref\n${xrefOffset}\n%%EOF\n`)]),
  );
}
