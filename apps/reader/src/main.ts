import { parseArgs } from "node:util";
import { bootstrapLibrary } from "./bootstrap";

const USAGE = "Usage: tsx apps/reader/src/main.ts [--db <library.db>] <book.pdf|book.epub>...";

async function main(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      db: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const { store, imported, failed, books } = await bootstrapLibrary({
    dbPath: values.db,
    files: positionals,
  });

  try {
    for (const result of imported) {
      const verb = result.status === "imported" ? "Added" : "Already in library";
      console.log(`[reader] ${verb}: ${result.book.title} (${result.book.filePath})`);
    }
    for (const failure of failed) {
      console.error(`[reader] Skipped ${failure.filePath}: ${failure.error.message}`);
    }

    console.log(`[reader] Library at ${store.path}: ${books.length} book(s)`);
    for (const book of books) {
      const position = store.getReadingPosition(book.id);
      const progress = position ? `${position.percent.toFixed(1)}%` : "unread";
      const author = book.author ? ` by ${book.author}` : "";
      console.log(`  ${book.title}${author} [${book.fileType}, ${book.totalPages} pages, ${progress}]`);
    }
  } finally {
    store.close();
  }

  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch(error => {
  console.error("[reader] Failed to open library:", error);
  process.exit(1);
});
