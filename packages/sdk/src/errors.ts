/**
 * Error types for catalog operations
 *
 * Invariants:
 * - All errors carry the offending field, parameter or id in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name`, `code` and `status` fields for programmatic handling
 */

import type { EntityKind, Identifier } from "./types.js";

/**
 * A single field-level validation failure
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base class for all catalog errors
 */
export abstract class CatalogError extends Error {
  abstract readonly code: string;
  /** HTTP-style status a request-handling layer should answer with */
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when input violates field constraints
 */
export class ValidationError extends CatalogError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 400;

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(`Validation failed: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`, options);
  }
}

/**
 * Thrown when an entity cannot be found
 *
 * `reference` is true when the missing id was referenced from another entity
 * (a book's author list) rather than being the target of the operation.
 */
export class NotFoundError extends CatalogError {
  readonly code = "NOT_FOUND";
  readonly status: number;

  constructor(
    public readonly entity: EntityKind,
    public readonly id: Identifier,
    public readonly reference = false,
    options?: ErrorOptions
  ) {
    super(`${entity === "author" ? "Author" : "Book"} not found: ${id}`, options);
    this.status = reference ? 422 : 404;
  }
}

/**
 * Thrown when an operation would break a catalog invariant
 */
export class ConflictError extends CatalogError {
  readonly code = "CONFLICT";
  readonly status = 409;

  constructor(
    public readonly entity: EntityKind,
    public readonly id: Identifier,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Conflict on ${entity} ${id}: ${reason}`, options);
  }
}

/**
 * Thrown when an identifier is inserted twice
 */
export class DuplicateKeyError extends CatalogError {
  readonly code = "DUPLICATE_KEY";
  readonly status = 500;

  constructor(
    public readonly id: Identifier,
    options?: ErrorOptions
  ) {
    super(`Duplicate key: ${id}`, options);
  }
}

/**
 * Thrown for malformed pagination or store arguments
 */
export class InvalidArgumentError extends CatalogError {
  readonly code = "INVALID_ARGUMENT";
  readonly status = 400;

  constructor(
    public readonly parameter: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid argument "${parameter}": ${reason}`, options);
  }
}

export type BoundarySignalKind =
  | "bad_request"
  | "not_found"
  | "unprocessable"
  | "conflict"
  | "internal";

export interface BoundarySignal {
  kind: BoundarySignalKind;
  status: number;
  message: string;
}

const SIGNAL_BY_STATUS: Record<number, BoundarySignalKind> = {
  400: "bad_request",
  404: "not_found",
  409: "conflict",
  422: "unprocessable",
};

/**
 * Translate any thrown value into the signal a request-handling layer should emit
 */
export function toBoundarySignal(error: unknown): BoundarySignal {
  if (error instanceof CatalogError) {
    const kind = SIGNAL_BY_STATUS[error.status];
    if (kind) {
      return { kind, status: error.status, message: error.message };
    }
    return { kind: "internal", status: 500, message: error.message };
  }

  return {
    kind: "internal",
    status: 500,
    message: error instanceof Error ? error.message : String(error),
  };
}
