/**
 * Core type definitions for the Bookshelf catalog
 */

import type { CatalogLogger } from "./observability/logs.js";
import type { CatalogMetrics } from "./observability/metrics.js";

/**
 * Opaque entity identifier (a v4 UUID by default)
 */
export type Identifier = string;

/**
 * Kinds of entity held by the catalog
 */
export type EntityKind = "author" | "book";

/**
 * Anything the entity store can hold
 */
export interface Entity {
  readonly id: Identifier;
}

/**
 * Author as returned to callers
 */
export interface Author {
  id: Identifier;
  name: string;
  /** Books currently referencing this author, in link order */
  book_ids: Identifier[];
}

/**
 * Book as returned to callers
 */
export interface Book {
  id: Identifier;
  title: string;
  /** Authors of this book; never empty */
  author_ids: Identifier[];
}

/**
 * Stored author record; `book_ids` is derived from the association index
 */
export interface AuthorRecord extends Entity {
  name: string;
}

/**
 * Stored book record; the association index owns `author_ids`
 */
export interface BookRecord extends Entity {
  title: string;
}

/**
 * One page of a filtered listing
 */
export interface Page<T> {
  items: T[];
  /** Number of matches before slicing */
  total_count: number;
}

/**
 * Pagination parameters accepted by list operations
 */
export interface PageRequest {
  /** Maximum results, 1-1000 (default: 100) */
  limit?: number;
  /** Results to skip, >= 0 (default: 0) */
  offset?: number;
}

export interface AuthorListRequest extends PageRequest {
  /** Case-sensitive substring of the author name */
  name_filter?: string;
}

export interface BookListRequest extends PageRequest {
  /** Case-sensitive substring of the book title */
  title_filter?: string;
  /** Restrict to books written by this author */
  author_id?: Identifier;
}

export interface AuthorList {
  authors: Author[];
  total_count: number;
}

export interface BookList {
  books: Book[];
  total_count: number;
}

export interface CatalogStats {
  authors: number;
  books: number;
  /** Number of (author, book) pairs */
  associations: number;
}

export type IdGenerator = () => Identifier;

export interface CatalogOptions {
  /** Source of new identifiers (default: random v4 UUIDs) */
  idGenerator?: IdGenerator;
  /** Event logger (default: the shared SDK logger) */
  logger?: CatalogLogger;
  /** Operation metrics (default: the shared SDK collector) */
  metrics?: CatalogMetrics;
}

/**
 * Author operations
 */
export interface AuthorService {
  create(name: string): Promise<Author>;
  get(id: Identifier): Promise<Author>;
  update(id: Identifier, name: string): Promise<Author>;
  list(request?: AuthorListRequest): Promise<AuthorList>;
  /**
   * Delete an author
   * @throws {ConflictError} If any book still references the author
   */
  delete(id: Identifier): Promise<void>;
}

/**
 * Book operations
 */
export interface BookService {
  create(title: string, authorIds: Identifier[]): Promise<Book>;
  get(id: Identifier): Promise<Book>;
  /**
   * Replace a book's title and full author list
   * Validates every author before changing anything
   */
  update(id: Identifier, title: string, authorIds: Identifier[]): Promise<Book>;
  list(request?: BookListRequest): Promise<BookList>;
  /**
   * Delete a book and unlink it from all of its authors
   */
  delete(id: Identifier): Promise<void>;
}

/**
 * Read-only questions across both entity kinds
 */
export interface LibraryQueries {
  sharedAuthors(bookA: Identifier, bookB: Identifier): Promise<Identifier[]>;
  sharedBooks(authorA: Identifier, authorB: Identifier): Promise<Identifier[]>;
  authorsWithoutBooks(): Promise<Author[]>;
}

export interface Catalog {
  readonly authors: AuthorService;
  readonly books: BookService;
  readonly library: LibraryQueries;
  stats(): Promise<CatalogStats>;
}
