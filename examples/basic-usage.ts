/**
 * Basic Usage Example
 *
 * Creates two authors and a co-written book, then walks the association both ways.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { ConflictError, openCatalog } from "@bookshelf/sdk";

async function main() {
  const catalog = openCatalog();

  const jane = await catalog.authors.create("Jane Doe");
  const john = await catalog.authors.create("John Roe");
  const book = await catalog.books.create("Example", [jane.id, john.id]);
  console.log("Created book:", book);

  // Both authors now list the book
  console.log("Jane:", await catalog.authors.get(jane.id));
  console.log("Shared books:", await catalog.library.sharedBooks(jane.id, john.id));

  // An author with books cannot be deleted...
  try {
    await catalog.authors.delete(jane.id);
  } catch (err) {
    if (err instanceof ConflictError) {
      console.log("Refused:", err.message);
    } else {
      throw err;
    }
  }

  // ...until the book is gone
  await catalog.books.delete(book.id);
  await catalog.authors.delete(jane.id);

  console.log("Stats:", await catalog.stats());
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
