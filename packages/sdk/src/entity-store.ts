/**
 * Generic keyed in-memory collection
 *
 * Entries keep their insertion position for their whole lifetime, including
 * across updates. The store checks key existence only; domain rules belong to
 * the services.
 */

import { DuplicateKeyError, InvalidArgumentError, NotFoundError } from "./errors.js";
import { assertPageBounds, paginate, type Predicate } from "./query.js";
import type { Entity, EntityKind, Identifier, Page } from "./types.js";

export class EntityStore<T extends Entity> {
  // Map iteration order is insertion order, and set() on an existing key keeps its slot
  #entries = new Map<Identifier, T>();
  #kind: EntityKind;

  constructor(kind: EntityKind) {
    this.#kind = kind;
  }

  get kind(): EntityKind {
    return this.#kind;
  }

  get size(): number {
    return this.#entries.size;
  }

  /**
   * Insert a new entity under its own id
   * @throws {DuplicateKeyError} If the id is already present
   */
  insert(entity: T): Identifier {
    if (this.#entries.has(entity.id)) {
      throw new DuplicateKeyError(entity.id);
    }
    this.#entries.set(entity.id, entity);
    return entity.id;
  }

  /**
   * @throws {NotFoundError} If the id is absent
   */
  get(id: Identifier): T {
    const entity = this.#entries.get(id);
    if (!entity) {
      throw new NotFoundError(this.#kind, id);
    }
    return entity;
  }

  has(id: Identifier): boolean {
    return this.#entries.has(id);
  }

  /**
   * Replace an entity with the mutator's result
   * @throws {NotFoundError} If the id is absent
   * @throws {InvalidArgumentError} If the mutator changes the id
   */
  update(id: Identifier, mutator: (current: T) => T): T {
    const next = mutator(this.get(id));
    if (next.id !== id) {
      throw new InvalidArgumentError("id", `cannot change from ${id} to ${next.id}`);
    }
    this.#entries.set(id, next);
    return next;
  }

  /**
   * @throws {NotFoundError} If the id is absent
   */
  delete(id: Identifier): void {
    if (!this.#entries.delete(id)) {
      throw new NotFoundError(this.#kind, id);
    }
  }

  /**
   * Filter in insertion order, then slice `[offset, offset + limit)`
   * @throws {InvalidArgumentError} If limit is outside [1, 1000] or offset is negative
   */
  list(predicate: Predicate<T>, offset: number, limit: number): Page<T> {
    assertPageBounds(offset, limit);

    const matched: T[] = [];
    for (const entity of this.#entries.values()) {
      if (predicate(entity)) {
        matched.push(entity);
      }
    }

    return {
      items: paginate(matched, offset, limit),
      total_count: matched.length,
    };
  }

  values(): IterableIterator<T> {
    return this.#entries.values();
  }
}
