/**
 * State shared by the services of one catalog
 */

import { AssociationIndex } from "./association-index.js";
import { EntityStore } from "./entity-store.js";
import { CatalogError, DuplicateKeyError } from "./errors.js";
import { ReadWriteLock } from "./lock.js";
import type { CatalogLogger } from "./observability/logs.js";
import type { CatalogMetrics } from "./observability/metrics.js";
import type {
  Author,
  AuthorRecord,
  Book,
  BookRecord,
  Identifier,
  IdGenerator,
} from "./types.js";

export interface CatalogContext {
  authors: EntityStore<AuthorRecord>;
  books: EntityStore<BookRecord>;
  links: AssociationIndex;
  lock: ReadWriteLock;
  /** Every identifier ever handed out, including deleted ones */
  issued: Set<Identifier>;
  idGenerator: IdGenerator;
  logger: CatalogLogger;
  metrics: CatalogMetrics;
}

export function createContext(
  idGenerator: IdGenerator,
  logger: CatalogLogger,
  metrics: CatalogMetrics
): CatalogContext {
  return {
    authors: new EntityStore<AuthorRecord>("author"),
    books: new EntityStore<BookRecord>("book"),
    links: new AssociationIndex(),
    lock: new ReadWriteLock(),
    issued: new Set(),
    idGenerator,
    logger,
    metrics,
  };
}

/**
 * Take a fresh identifier; must be called with the write side held
 * @throws {DuplicateKeyError} If the generator repeats an identifier
 */
export function issueId(ctx: CatalogContext): Identifier {
  const id = ctx.idGenerator();
  if (ctx.issued.has(id)) {
    throw new DuplicateKeyError(id);
  }
  ctx.issued.add(id);
  return id;
}

export function toAuthor(ctx: CatalogContext, record: AuthorRecord): Author {
  return { id: record.id, name: record.name, book_ids: ctx.links.booksOf(record.id) };
}

export function toBook(ctx: CatalogContext, record: BookRecord): Book {
  return { id: record.id, title: record.title, author_ids: ctx.links.authorsOf(record.id) };
}

/**
 * Wrap an operation with timing metrics and failure logging
 */
export async function instrument<T>(
  ctx: CatalogContext,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } catch (err) {
    if (err instanceof CatalogError) {
      ctx.logger.warn(`${operation}.rejected`, {
        message: err.message,
        details: { code: err.code, status: err.status },
      });
    } else {
      ctx.logger.error(`${operation}.failed`, {
        message: err instanceof Error ? err.message : String(err),
      });
    }
    throw err;
  } finally {
    ctx.metrics.record(operation, Date.now() - start, success);
  }
}
