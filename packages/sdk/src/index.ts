/**
 * Bookshelf SDK
 *
 * An in-memory author/book catalog with a consistent many-to-many association
 */

// Re-export types
export type {
  Identifier,
  EntityKind,
  Entity,
  Author,
  Book,
  AuthorRecord,
  BookRecord,
  Page,
  PageRequest,
  AuthorListRequest,
  BookListRequest,
  AuthorList,
  BookList,
  CatalogStats,
  IdGenerator,
  CatalogOptions,
  AuthorService,
  BookService,
  LibraryQueries,
  Catalog,
} from "./types.js";

// Re-export building blocks
export { EntityStore } from "./entity-store.js";
export { AssociationIndex } from "./association-index.js";
export type { AuthorChange } from "./association-index.js";
export { ReadWriteLock } from "./lock.js";
export { newId, sequenceIds } from "./ids.js";
export { DEFAULT_LIMIT, MAX_LIMIT, assertPageBounds, paginate } from "./query.js";
export type { Predicate } from "./query.js";

// Re-export validation
export {
  AUTHOR_NAME_MAX,
  BOOK_TITLE_MAX,
  validateText,
  validateAuthorName,
  validateBookTitle,
  validateIdentifier,
  validateAuthorIds,
  validateBookInput,
  unwrap,
} from "./validation.js";
export type { Validated, BookInput } from "./validation.js";

// Re-export observability
export { CatalogLogger, formatLogLine, logger } from "./observability/logs.js";
export type { LogFields, LogSink, CatalogLoggerOptions } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { CatalogMetrics, metrics } from "./observability/metrics.js";
export type { OperationMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  CatalogError,
  ValidationError,
  NotFoundError,
  ConflictError,
  DuplicateKeyError,
  InvalidArgumentError,
  toBoundarySignal,
} from "./errors.js";
export type { ValidationIssue, BoundarySignal, BoundarySignalKind } from "./errors.js";

export { openCatalog } from "./catalog.js";

export { SERVICE_VERSION, API_FEATURES, describeService, healthReport, apiStatus } from "./service-info.js";
export type { ServiceInfo, HealthReport, ApiStatus } from "./service-info.js";
