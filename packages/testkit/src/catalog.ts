/**
 * Catalog fixtures shared by package tests
 */

import { CatalogLogger, CatalogMetrics, openCatalog } from "@bookshelf/sdk";
import type { Author, Book, Catalog, CatalogOptions } from "@bookshelf/sdk";

/**
 * Catalog with logging off and its own metrics collector
 */
export function quietCatalog(options: CatalogOptions = {}): Catalog {
  return openCatalog({ logger: new CatalogLogger({ enabled: false }), metrics: new CatalogMetrics(), ...options });
}

export interface SeedOptions {
  authors: number;
  /** Each book is written by this many consecutive authors (default: 1) */
  authorsPerBook?: number;
  books: number;
}

export interface Seeded {
  authors: Author[];
  books: Book[];
}

/**
 * Fill a catalog with "Author N" and "Book N"; book i is written by authors i, i+1, ... (wrapping)
 */
export async function seedCatalog(catalog: Catalog, options: SeedOptions): Promise<Seeded> {
  if (options.books > 0 && options.authors < 1) {
    throw new Error("seedCatalog needs at least one author");
  }
  const perBook = Math.min(options.authorsPerBook ?? 1, options.authors);
  const authors: Author[] = [];
  for (let i = 1; i <= options.authors; i++) {
    authors.push(await catalog.authors.create(`Author ${i}`));
  }

  const books: Book[] = [];
  for (let i = 0; i < options.books; i++) {
    const authorIds = Array.from({ length: perBook }, (_, k) => authors[(i + k) % authors.length]?.id ?? "");
    books.push(await catalog.books.create(`Book ${i + 1}`, authorIds));
  }

  return { authors, books };
}
