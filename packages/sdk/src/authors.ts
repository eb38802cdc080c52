/**
 * Author operations
 */

import { ConflictError } from "./errors.js";
import { instrument, issueId, toAuthor, type CatalogContext } from "./context.js";
import { DEFAULT_LIMIT, allOf, containsText } from "./query.js";
import { unwrap, validateAuthorName, validateIdentifier } from "./validation.js";
import type {
  Author,
  AuthorList,
  AuthorListRequest,
  AuthorRecord,
  AuthorService,
  Identifier,
} from "./types.js";

export class AuthorManager implements AuthorService {
  #ctx: CatalogContext;

  constructor(ctx: CatalogContext) {
    this.#ctx = ctx;
  }

  /**
   * Create an author with no books
   * @throws {ValidationError} If the name is empty, blank or longer than 100 characters
   */
  async create(name: string): Promise<Author> {
    return instrument(this.#ctx, "author.create", async () => {
      const value = unwrap(validateAuthorName(name));

      return this.#ctx.lock.withWrite(() => {
        const record: AuthorRecord = { id: issueId(this.#ctx), name: value };
        this.#ctx.authors.insert(record);
        this.#ctx.logger.info("author.created", { entity: "author", id: record.id });
        return toAuthor(this.#ctx, record);
      });
    });
  }

  /**
   * @throws {NotFoundError} If the author does not exist
   */
  async get(id: Identifier): Promise<Author> {
    return instrument(this.#ctx, "author.get", async () => {
      const authorId = unwrap(validateIdentifier(id, "id"));
      return this.#ctx.lock.withRead(() => toAuthor(this.#ctx, this.#ctx.authors.get(authorId)));
    });
  }

  /**
   * Rename an author; its books are untouched
   * @throws {ValidationError} If the name is invalid
   * @throws {NotFoundError} If the author does not exist
   */
  async update(id: Identifier, name: string): Promise<Author> {
    return instrument(this.#ctx, "author.update", async () => {
      const authorId = unwrap(validateIdentifier(id, "id"));
      const value = unwrap(validateAuthorName(name));

      return this.#ctx.lock.withWrite(() => {
        const record = this.#ctx.authors.update(authorId, (current) => ({ ...current, name: value }));
        this.#ctx.logger.info("author.updated", { entity: "author", id: authorId });
        return toAuthor(this.#ctx, record);
      });
    });
  }

  /**
   * List authors in creation order
   * @throws {InvalidArgumentError} If limit or offset is out of range
   */
  async list(request: AuthorListRequest = {}): Promise<AuthorList> {
    return instrument(this.#ctx, "author.list", async () => {
      const { name_filter, limit = DEFAULT_LIMIT, offset = 0 } = request;
      const predicate = allOf(containsText<AuthorRecord>((a) => a.name, name_filter));

      return this.#ctx.lock.withRead(() => {
        const page = this.#ctx.authors.list(predicate, offset, limit);
        return {
          authors: page.items.map((record) => toAuthor(this.#ctx, record)),
          total_count: page.total_count,
        };
      });
    });
  }

  /**
   * @throws {NotFoundError} If the author does not exist
   * @throws {ConflictError} If any book still references the author
   */
  async delete(id: Identifier): Promise<void> {
    return instrument(this.#ctx, "author.delete", async () => {
      const authorId = unwrap(validateIdentifier(id, "id"));

      await this.#ctx.lock.withWrite(() => {
        this.#ctx.authors.get(authorId);

        const books = this.#ctx.links.booksOf(authorId);
        if (books.length > 0) {
          throw new ConflictError(
            "author",
            authorId,
            `still referenced by ${books.length} book${books.length === 1 ? "" : "s"}`
          );
        }

        this.#ctx.authors.delete(authorId);
        this.#ctx.logger.info("author.deleted", { entity: "author", id: authorId });
      });
    });
  }
}
