/**
 * Many-to-many relation between authors and books
 *
 * `book -> authors` is authoritative; `author -> books` is its inverse and is
 * only ever changed together with it. Both sides keep link order.
 */

import type { Identifier } from "./types.js";

export interface AuthorChange {
  added: Identifier[];
  removed: Identifier[];
}

export class AssociationIndex {
  #authorsByBook = new Map<Identifier, Set<Identifier>>();
  #booksByAuthor = new Map<Identifier, Set<Identifier>>();

  /**
   * Link an author and a book (no-op if already linked)
   */
  link(authorId: Identifier, bookId: Identifier): void {
    let authors = this.#authorsByBook.get(bookId);
    if (!authors) {
      authors = new Set();
      this.#authorsByBook.set(bookId, authors);
    }
    authors.add(authorId);

    let books = this.#booksByAuthor.get(authorId);
    if (!books) {
      books = new Set();
      this.#booksByAuthor.set(authorId, books);
    }
    books.add(bookId);
  }

  /**
   * Unlink an author and a book (no-op if not linked)
   */
  unlink(authorId: Identifier, bookId: Identifier): void {
    const authors = this.#authorsByBook.get(bookId);
    if (authors) {
      authors.delete(authorId);
      if (authors.size === 0) this.#authorsByBook.delete(bookId);
    }

    const books = this.#booksByAuthor.get(authorId);
    if (books) {
      books.delete(bookId);
      if (books.size === 0) this.#booksByAuthor.delete(authorId);
    }
  }

  authorsOf(bookId: Identifier): Identifier[] {
    return [...(this.#authorsByBook.get(bookId) ?? [])];
  }

  booksOf(authorId: Identifier): Identifier[] {
    return [...(this.#booksByAuthor.get(authorId) ?? [])];
  }

  hasAuthor(bookId: Identifier, authorId: Identifier): boolean {
    return this.#authorsByBook.get(bookId)?.has(authorId) ?? false;
  }

  hasBooks(authorId: Identifier): boolean {
    return (this.#booksByAuthor.get(authorId)?.size ?? 0) > 0;
  }

  /**
   * Make `authorIds` the exact author list of a book
   *
   * The book's author order becomes the given order (duplicates dropped).
   * On the author side only added and removed authors change.
   */
  replaceAuthors(bookId: Identifier, authorIds: Identifier[]): AuthorChange {
    const current = this.authorsOf(bookId);
    const next = new Set(authorIds);

    const removed = current.filter((id) => !next.has(id));
    const added = [...next].filter((id) => !current.includes(id));

    for (const authorId of removed) {
      this.unlink(authorId, bookId);
    }
    for (const authorId of added) {
      this.link(authorId, bookId);
    }
    if (next.size > 0) {
      this.#authorsByBook.set(bookId, next);
    }

    return { added, removed };
  }

  /**
   * Remove a book from every author that references it
   * @returns The authors the book was linked to
   */
  dropBook(bookId: Identifier): Identifier[] {
    const authors = this.authorsOf(bookId);
    for (const authorId of authors) {
      this.unlink(authorId, bookId);
    }
    return authors;
  }

  /**
   * Number of (author, book) pairs
   */
  get size(): number {
    let count = 0;
    for (const authors of this.#authorsByBook.values()) {
      count += authors.size;
    }
    return count;
  }
}
