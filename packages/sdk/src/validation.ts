/**
 * Input validation for catalog operations
 *
 * Validators never throw; they return a tagged result so services can check
 * every input before touching state. `unwrap` turns a failure into a
 * ValidationError at the service boundary.
 */

import { ValidationError, type ValidationIssue } from "./errors.js";
import type { Identifier } from "./types.js";

export const AUTHOR_NAME_MAX = 100;
export const BOOK_TITLE_MAX = 200;

export type Validated<T> = { ok: true; value: T } | { ok: false; issues: ValidationIssue[] };

function valid<T>(value: T): Validated<T> {
  return { ok: true, value };
}

function invalid<T>(field: string, message: string): Validated<T> {
  return { ok: false, issues: [{ field, message }] };
}

/**
 * Validate a bounded text field
 * Length is counted in code points on the raw value; the accepted value is trimmed.
 */
export function validateText(input: unknown, field: string, max: number): Validated<string> {
  if (typeof input !== "string") {
    return invalid(field, "must be a string");
  }
  if (input.length === 0) {
    return invalid(field, "must not be empty");
  }
  if ([...input].length > max) {
    return invalid(field, `must be at most ${max} characters`);
  }

  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return invalid(field, "must not be only whitespace");
  }
  return valid(trimmed);
}

export function validateAuthorName(input: unknown): Validated<string> {
  return validateText(input, "name", AUTHOR_NAME_MAX);
}

export function validateBookTitle(input: unknown): Validated<string> {
  return validateText(input, "title", BOOK_TITLE_MAX);
}

/**
 * Validate a single identifier
 */
export function validateIdentifier(input: unknown, field: string): Validated<Identifier> {
  if (typeof input !== "string" || input.length === 0) {
    return invalid(field, "must be a non-empty string");
  }
  return valid(input);
}

/**
 * Validate a book's author list
 * Duplicates collapse to their first occurrence.
 */
export function validateAuthorIds(input: unknown): Validated<Identifier[]> {
  if (!Array.isArray(input)) {
    return invalid("author_ids", "must be an array");
  }
  if (input.length === 0) {
    return invalid("author_ids", "must contain at least one author");
  }

  const issues: ValidationIssue[] = [];
  const ids: Identifier[] = [];
  input.forEach((entry: unknown, i) => {
    const result = validateIdentifier(entry, `author_ids[${i}]`);
    if (result.ok) {
      if (!ids.includes(result.value)) ids.push(result.value);
    } else {
      issues.push(...result.issues);
    }
  });

  return issues.length > 0 ? { ok: false, issues } : valid(ids);
}

export interface BookInput {
  title: string;
  author_ids: Identifier[];
}

/**
 * Validate a whole book payload, collecting issues from every field
 */
export function validateBookInput(title: unknown, authorIds: unknown): Validated<BookInput> {
  const titleResult = validateBookTitle(title);
  const idsResult = validateAuthorIds(authorIds);

  if (titleResult.ok && idsResult.ok) {
    return valid({ title: titleResult.value, author_ids: idsResult.value });
  }

  const issues = [
    ...(titleResult.ok ? [] : titleResult.issues),
    ...(idsResult.ok ? [] : idsResult.issues),
  ];
  return { ok: false, issues };
}

/**
 * Extract the value of a validation result
 * @throws {ValidationError} If the result carries issues
 */
export function unwrap<T>(result: Validated<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return result.value;
}
