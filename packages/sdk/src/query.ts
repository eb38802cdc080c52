/**
 * Listing helpers: predicates and offset/limit pagination
 */

import { InvalidArgumentError } from "./errors.js";

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 1000;

export type Predicate<T> = (item: T) => boolean;

/**
 * Check pagination bounds
 * @throws {InvalidArgumentError} If limit is outside [1, 1000] or offset is negative
 */
export function assertPageBounds(offset: number, limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new InvalidArgumentError("limit", `must be an integer between 1 and ${MAX_LIMIT}, got ${limit}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidArgumentError("offset", `must be a non-negative integer, got ${offset}`);
  }
}

/**
 * Apply pagination to items
 * @param items - Items to paginate
 * @param offset - Number to skip
 * @param limit - Maximum to return
 * @returns Paginated slice
 */
export function paginate<T>(items: T[], offset: number, limit: number): T[] {
  return items.slice(offset, offset + limit);
}

/**
 * Combine predicates with logical AND; undefined entries are skipped
 */
export function allOf<T>(...predicates: Array<Predicate<T> | undefined>): Predicate<T> {
  const active = predicates.filter((p): p is Predicate<T> => p !== undefined);
  return (item) => active.every((p) => p(item));
}

/**
 * Case-sensitive substring predicate over a string field
 * Returns undefined when there is no needle, so callers can pass it straight to `allOf`
 */
export function containsText<T>(
  field: (item: T) => string,
  needle: string | undefined
): Predicate<T> | undefined {
  if (needle === undefined) {
    return undefined;
  }
  return (item) => field(item).includes(needle);
}
