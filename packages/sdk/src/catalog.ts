/**
 * Catalog composition
 */

import { AuthorManager } from "./authors.js";
import { BookManager } from "./books.js";
import { createContext, instrument, type CatalogContext } from "./context.js";
import { newId } from "./ids.js";
import { Library } from "./library.js";
import { logger as defaultLogger } from "./observability/logs.js";
import { metrics as defaultMetrics } from "./observability/metrics.js";
import type { Catalog, CatalogOptions, CatalogStats } from "./types.js";

/**
 * In-memory author/book catalog
 *
 * Each instance owns its own stores, association index and lock. Nothing is
 * shared between catalogs except, by default, the logger and metrics sink.
 *
 * @example
 * ```typescript
 * const catalog = openCatalog();
 *
 * const jane = await catalog.authors.create("Jane Doe");
 * const book = await catalog.books.create("Example", [jane.id]);
 *
 * (await catalog.authors.get(jane.id)).book_ids; // [book.id]
 * ```
 */
class InMemoryCatalog implements Catalog {
  readonly authors: AuthorManager;
  readonly books: BookManager;
  readonly library: Library;
  #ctx: CatalogContext;

  constructor(options: CatalogOptions) {
    this.#ctx = createContext(
      options.idGenerator ?? newId,
      options.logger ?? defaultLogger,
      options.metrics ?? defaultMetrics
    );
    this.authors = new AuthorManager(this.#ctx);
    this.books = new BookManager(this.#ctx);
    this.library = new Library(this.#ctx);
  }

  async stats(): Promise<CatalogStats> {
    return instrument(this.#ctx, "catalog.stats", () =>
      this.#ctx.lock.withRead(() => ({
        authors: this.#ctx.authors.size,
        books: this.#ctx.books.size,
        associations: this.#ctx.links.size,
      }))
    );
  }
}

/**
 * Open a new, empty catalog
 */
export function openCatalog(options: CatalogOptions = {}): Catalog {
  return new InMemoryCatalog(options);
}
