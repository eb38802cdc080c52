/**
 * Identifier generation
 */

import { randomUUID } from "node:crypto";
import type { Identifier, IdGenerator } from "./types.js";

/**
 * Generate a new random identifier (v4 UUID, 122 random bits)
 */
export function newId(): Identifier {
  return randomUUID();
}

/**
 * Build a generator that yields the given ids in order, then falls back to `newId`
 * Handy for deterministic fixtures
 */
export function sequenceIds(ids: Iterable<Identifier>): IdGenerator {
  const it = ids[Symbol.iterator]();
  return () => {
    const next = it.next();
    return next.done ? newId() : next.value;
  };
}
