/**
 * Read-only questions spanning authors and books
 */

import { instrument, toAuthor, type CatalogContext } from "./context.js";
import { unwrap, validateIdentifier } from "./validation.js";
import type { Author, Identifier, LibraryQueries } from "./types.js";

export class Library implements LibraryQueries {
  #ctx: CatalogContext;

  constructor(ctx: CatalogContext) {
    this.#ctx = ctx;
  }

  /**
   * Authors of both books, in the order they appear on the first
   * @throws {NotFoundError} If either book does not exist
   */
  async sharedAuthors(bookA: Identifier, bookB: Identifier): Promise<Identifier[]> {
    return instrument(this.#ctx, "library.shared_authors", async () => {
      const a = unwrap(validateIdentifier(bookA, "book_a"));
      const b = unwrap(validateIdentifier(bookB, "book_b"));

      return this.#ctx.lock.withRead(() => {
        this.#ctx.books.get(a);
        this.#ctx.books.get(b);
        return this.#ctx.links.authorsOf(a).filter((authorId) => this.#ctx.links.hasAuthor(b, authorId));
      });
    });
  }

  /**
   * Books written by both authors, in the order they were linked to the first
   * @throws {NotFoundError} If either author does not exist
   */
  async sharedBooks(authorA: Identifier, authorB: Identifier): Promise<Identifier[]> {
    return instrument(this.#ctx, "library.shared_books", async () => {
      const a = unwrap(validateIdentifier(authorA, "author_a"));
      const b = unwrap(validateIdentifier(authorB, "author_b"));

      return this.#ctx.lock.withRead(() => {
        this.#ctx.authors.get(a);
        this.#ctx.authors.get(b);
        return this.#ctx.links.booksOf(a).filter((bookId) => this.#ctx.links.hasAuthor(bookId, b));
      });
    });
  }

  /**
   * Authors no book references; these are the ones that can be deleted
   */
  async authorsWithoutBooks(): Promise<Author[]> {
    return instrument(this.#ctx, "library.authors_without_books", async () =>
      this.#ctx.lock.withRead(() => {
        const result: Author[] = [];
        for (const record of this.#ctx.authors.values()) {
          if (!this.#ctx.links.hasBooks(record.id)) {
            result.push(toAuthor(this.#ctx, record));
          }
        }
        return result;
      })
    );
  }
}
