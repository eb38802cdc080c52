/**
 * Book operations
 *
 * Every mutation checks all of its preconditions before the first write, so
 * a rejected call leaves the catalog exactly as it was.
 */

import { NotFoundError } from "./errors.js";
import { instrument, issueId, toBook, type CatalogContext } from "./context.js";
import { DEFAULT_LIMIT, allOf, containsText, type Predicate } from "./query.js";
import { unwrap, validateBookInput, validateIdentifier } from "./validation.js";
import type {
  Book,
  BookList,
  BookListRequest,
  BookRecord,
  BookService,
  Identifier,
} from "./types.js";

export class BookManager implements BookService {
  #ctx: CatalogContext;

  constructor(ctx: CatalogContext) {
    this.#ctx = ctx;
  }

  /**
   * Create a book and link it to each of its authors
   * @throws {ValidationError} If the title is invalid or the author list is empty
   * @throws {NotFoundError} If an author does not exist (`reference` is set)
   */
  async create(title: string, authorIds: Identifier[]): Promise<Book> {
    return instrument(this.#ctx, "book.create", async () => {
      const input = unwrap(validateBookInput(title, authorIds));

      return this.#ctx.lock.withWrite(() => {
        this.#assertAuthorsExist(input.author_ids);

        const record: BookRecord = { id: issueId(this.#ctx), title: input.title };
        this.#ctx.books.insert(record);
        for (const authorId of input.author_ids) {
          this.#ctx.links.link(authorId, record.id);
        }

        this.#ctx.logger.info("book.created", {
          entity: "book",
          id: record.id,
          details: { authors: input.author_ids.length },
        });
        return toBook(this.#ctx, record);
      });
    });
  }

  /**
   * @throws {NotFoundError} If the book does not exist
   */
  async get(id: Identifier): Promise<Book> {
    return instrument(this.#ctx, "book.get", async () => {
      const bookId = unwrap(validateIdentifier(id, "id"));
      return this.#ctx.lock.withRead(() => toBook(this.#ctx, this.#ctx.books.get(bookId)));
    });
  }

  /**
   * Replace title and author list
   * @throws {ValidationError} If the title is invalid or the author list is empty
   * @throws {NotFoundError} If the book or any listed author does not exist
   */
  async update(id: Identifier, title: string, authorIds: Identifier[]): Promise<Book> {
    return instrument(this.#ctx, "book.update", async () => {
      const bookId = unwrap(validateIdentifier(id, "id"));
      const input = unwrap(validateBookInput(title, authorIds));

      return this.#ctx.lock.withWrite(() => {
        this.#ctx.books.get(bookId);
        this.#assertAuthorsExist(input.author_ids);

        const record = this.#ctx.books.update(bookId, (current) => ({ ...current, title: input.title }));
        const change = this.#ctx.links.replaceAuthors(bookId, input.author_ids);

        this.#ctx.logger.info("book.updated", {
          entity: "book",
          id: bookId,
          details: { added: change.added, removed: change.removed },
        });
        return toBook(this.#ctx, record);
      });
    });
  }

  /**
   * List books in creation order; filters combine with AND
   * @throws {InvalidArgumentError} If limit or offset is out of range
   */
  async list(request: BookListRequest = {}): Promise<BookList> {
    return instrument(this.#ctx, "book.list", async () => {
      const { title_filter, author_id, limit = DEFAULT_LIMIT, offset = 0 } = request;

      const byAuthor: Predicate<BookRecord> | undefined =
        author_id === undefined ? undefined : (b) => this.#ctx.links.hasAuthor(b.id, author_id);
      const predicate = allOf(containsText<BookRecord>((b) => b.title, title_filter), byAuthor);

      return this.#ctx.lock.withRead(() => {
        const page = this.#ctx.books.list(predicate, offset, limit);
        return {
          books: page.items.map((record) => toBook(this.#ctx, record)),
          total_count: page.total_count,
        };
      });
    });
  }

  /**
   * Delete a book after unlinking it from all of its authors
   * @throws {NotFoundError} If the book does not exist
   */
  async delete(id: Identifier): Promise<void> {
    return instrument(this.#ctx, "book.delete", async () => {
      const bookId = unwrap(validateIdentifier(id, "id"));

      await this.#ctx.lock.withWrite(() => {
        this.#ctx.books.get(bookId);
        const authors = this.#ctx.links.dropBook(bookId);
        this.#ctx.books.delete(bookId);

        this.#ctx.logger.info("book.deleted", {
          entity: "book",
          id: bookId,
          details: { unlinked: authors },
        });
      });
    });
  }

  #assertAuthorsExist(authorIds: Identifier[]): void {
    for (const authorId of authorIds) {
      if (!this.#ctx.authors.has(authorId)) {
        throw new NotFoundError("author", authorId, true);
      }
    }
  }
}
