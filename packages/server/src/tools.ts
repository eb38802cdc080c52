/**
 * MCP tool implementations for the Bookshelf catalog
 * Every tool returns two text content items: a summary and the JSON payload
 */

import {
  CreateAuthorInputSchema,
  UpdateAuthorInputSchema,
  AuthorIdInputSchema,
  ListAuthorsInputSchema,
  CreateBookInputSchema,
  UpdateBookInputSchema,
  BookIdInputSchema,
  ListBooksInputSchema,
  SharedAuthorsInputSchema,
  SharedBooksInputSchema,
  EmptyInputSchema,
} from "./schemas.js";
import type { CatalogService } from "./service/catalog.js";
import { ToolTimeoutError, errorCodeOf } from "./errors.js";
import type { ToolRateLimiter } from "./rate-limit.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export const TOOL_NAMES = [
  "service_info",
  "health_check",
  "api_status",
  "catalog_stats",
  "create_author",
  "get_author",
  "update_author",
  "delete_author",
  "list_authors",
  "create_book",
  "get_book",
  "update_book",
  "delete_book",
  "list_books",
  "shared_authors",
  "shared_books",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Tools that never change the catalog */
export const READ_ONLY_TOOLS: readonly ToolName[] = [
  "service_info",
  "health_check",
  "api_status",
  "catalog_stats",
  "get_author",
  "list_authors",
  "get_book",
  "list_books",
  "shared_authors",
  "shared_books",
];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

// A type alias (not an interface) so the result stays assignable to the SDK's open result type
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

const READ_TIMEOUT_MS = 2000;
// A write that times out while queued on the catalog lock still runs once it
// gets the lock; the caller only stops waiting for it
const WRITE_TIMEOUT_MS = 5000;

function respond(summary: string, payload: unknown): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
  };
}

// Wraps tool execution with rate limiting, timeout, logging, and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>,
  limiter?: ToolRateLimiter
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let failure: unknown;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    limiter?.acquire(toolName);

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    failure = err;
    throw err;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    const code = success ? undefined : errorCodeOf(failure);
    logger.toolCall(
      toolName,
      duration,
      success,
      code === undefined
        ? undefined
        : { code, message: failure instanceof Error ? failure.message : String(failure) }
    );
    recordToolExecution(toolName, duration, success, code);
  }
}

/**
 * Build the handler for every tool over one catalog service
 * Arguments are parsed before the timer starts, so malformed input is never
 * timed and takes no rate-limit quota
 */
export function createToolHandlers(service: CatalogService, limiter?: ToolRateLimiter): Record<ToolName, ToolHandler> {
  const { authors, books, library } = service.catalog;
  const run = <T>(tool: ToolName, timeoutMs: number, handler: () => Promise<T>) =>
    executeTool(tool, timeoutMs, handler, limiter);

  return {
    service_info: async (args) => {
      EmptyInputSchema.parse(args);
      return run("service_info", READ_TIMEOUT_MS, async () => {
        const info = service.info();
        return respond(`${info.message} ${info.version}`, info);
      });
    },

    health_check: async (args) => {
      EmptyInputSchema.parse(args);
      return run("health_check", READ_TIMEOUT_MS, async () => {
        const health = service.health();
        return respond(`${health.service} is ${health.status}`, health);
      });
    },

    api_status: async (args) => {
      EmptyInputSchema.parse(args);
      return run("api_status", READ_TIMEOUT_MS, async () => {
        const status = service.apiStatus();
        return respond(`API ${status.api_version} is ${status.status}`, status);
      });
    },

    catalog_stats: async (args) => {
      EmptyInputSchema.parse(args);
      return run("catalog_stats", READ_TIMEOUT_MS, async () => {
        const stats = await service.stats();
        return respond(
          `${stats.authors} authors, ${stats.books} books, ${stats.associations} associations`,
          stats
        );
      });
    },

    create_author: async (args) => {
      const { name } = CreateAuthorInputSchema.parse(args);
      return run("create_author", WRITE_TIMEOUT_MS, async () => {
        const author = await authors.create(name);
        return respond(`Created author ${author.id}`, author);
      });
    },

    get_author: async (args) => {
      const { id } = AuthorIdInputSchema.parse(args);
      return run("get_author", READ_TIMEOUT_MS, async () => {
        const author = await authors.get(id);
        return respond(`Found author ${author.id}`, author);
      });
    },

    update_author: async (args) => {
      const { id, name } = UpdateAuthorInputSchema.parse(args);
      return run("update_author", WRITE_TIMEOUT_MS, async () => {
        const author = await authors.update(id, name);
        return respond(`Updated author ${author.id}`, author);
      });
    },

    delete_author: async (args) => {
      const { id } = AuthorIdInputSchema.parse(args);
      return run("delete_author", WRITE_TIMEOUT_MS, async () => {
        await authors.delete(id);
        return respond(`Deleted author ${id}`, { ok: true });
      });
    },

    list_authors: async (args) => {
      const request = ListAuthorsInputSchema.parse(args);
      return run("list_authors", READ_TIMEOUT_MS, async () => {
        const list = await authors.list(request);
        return respond(`Found ${list.authors.length} of ${list.total_count} authors`, list);
      });
    },

    create_book: async (args) => {
      const { title, author_ids } = CreateBookInputSchema.parse(args);
      return run("create_book", WRITE_TIMEOUT_MS, async () => {
        const book = await books.create(title, author_ids);
        return respond(`Created book ${book.id}`, book);
      });
    },

    get_book: async (args) => {
      const { id } = BookIdInputSchema.parse(args);
      return run("get_book", READ_TIMEOUT_MS, async () => {
        const book = await books.get(id);
        return respond(`Found book ${book.id}`, book);
      });
    },

    update_book: async (args) => {
      const { id, title, author_ids } = UpdateBookInputSchema.parse(args);
      return run("update_book", WRITE_TIMEOUT_MS, async () => {
        const book = await books.update(id, title, author_ids);
        return respond(`Updated book ${book.id}`, book);
      });
    },

    delete_book: async (args) => {
      const { id } = BookIdInputSchema.parse(args);
      return run("delete_book", WRITE_TIMEOUT_MS, async () => {
        await books.delete(id);
        return respond(`Deleted book ${id}`, { ok: true });
      });
    },

    list_books: async (args) => {
      const request = ListBooksInputSchema.parse(args);
      return run("list_books", READ_TIMEOUT_MS, async () => {
        const list = await books.list(request);
        return respond(`Found ${list.books.length} of ${list.total_count} books`, list);
      });
    },

    shared_authors: async (args) => {
      const { book_a, book_b } = SharedAuthorsInputSchema.parse(args);
      return run("shared_authors", READ_TIMEOUT_MS, async () => {
        const author_ids = await library.sharedAuthors(book_a, book_b);
        return respond(`Found ${author_ids.length} shared authors`, { author_ids });
      });
    },

    shared_books: async (args) => {
      const { author_a, author_b } = SharedBooksInputSchema.parse(args);
      return run("shared_books", READ_TIMEOUT_MS, async () => {
        const book_ids = await library.sharedBooks(author_a, author_b);
        return respond(`Found ${book_ids.length} shared books`, { book_ids });
      });
    },
  };
}

const idProperty = (description: string) => ({
  type: "string",
  format: "uuid",
  description,
});

const authorIdsProperty = {
  type: "array",
  items: { type: "string", format: "uuid" },
  minItems: 1,
  description: "Authors of the book (at least one; duplicates collapse to the first occurrence)",
};

const pageProperties = {
  limit: {
    type: "integer",
    minimum: 1,
    maximum: 1000,
    description: "Maximum number of results (max 1000, default 100)",
  },
  offset: {
    type: "integer",
    minimum: 0,
    description: "Number of results to skip (default 0)",
  },
};

export type ToolInputSchema = {
  type: "object";
  properties?: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
};

const noInput: ToolInputSchema = { type: "object", properties: {}, additionalProperties: false };

/**
 * Tool definitions for the MCP server
 */
export const toolDefinitions: Array<{
  name: ToolName;
  description: string;
  inputSchema: ToolInputSchema;
}> = [
  {
    name: "service_info",
    description: "Describe the catalog service",
    inputSchema: noInput,
  },
  {
    name: "health_check",
    description: "Report service health",
    inputSchema: noInput,
  },
  {
    name: "api_status",
    description: "Report API version and supported features",
    inputSchema: noInput,
  },
  {
    name: "catalog_stats",
    description: "Count authors, books and author/book associations",
    inputSchema: noInput,
  },
  {
    name: "create_author",
    description: "Create an author",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", minLength: 1, maxLength: 100, description: "Author name" },
      },
      required: ["name"],
    },
  },
  {
    name: "get_author",
    description: "Retrieve an author and the ids of their books",
    inputSchema: {
      type: "object",
      properties: { id: idProperty("Author ID") },
      required: ["id"],
    },
  },
  {
    name: "update_author",
    description: "Rename an author",
    inputSchema: {
      type: "object",
      properties: {
        id: idProperty("Author ID"),
        name: { type: "string", minLength: 1, maxLength: 100, description: "New author name" },
      },
      required: ["id", "name"],
    },
  },
  {
    name: "delete_author",
    description: "Delete an author (fails while any book references the author)",
    inputSchema: {
      type: "object",
      properties: { id: idProperty("Author ID") },
      required: ["id"],
    },
  },
  {
    name: "list_authors",
    description: "List authors in creation order, optionally filtered by a name substring",
    inputSchema: {
      type: "object",
      properties: {
        name_filter: { type: "string", description: "Case-sensitive substring of the name" },
        ...pageProperties,
      },
    },
  },
  {
    name: "create_book",
    description: "Create a book written by one or more existing authors",
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", minLength: 1, maxLength: 200, description: "Book title" },
        author_ids: authorIdsProperty,
      },
      required: ["title", "author_ids"],
    },
  },
  {
    name: "get_book",
    description: "Retrieve a book",
    inputSchema: {
      type: "object",
      properties: { id: idProperty("Book ID") },
      required: ["id"],
    },
  },
  {
    name: "update_book",
    description: "Replace a book's title and author list",
    inputSchema: {
      type: "object",
      properties: {
        id: idProperty("Book ID"),
        title: { type: "string", minLength: 1, maxLength: 200, description: "New book title" },
        author_ids: authorIdsProperty,
      },
      required: ["id", "title", "author_ids"],
    },
  },
  {
    name: "delete_book",
    description: "Delete a book and unlink it from its authors",
    inputSchema: {
      type: "object",
      properties: { id: idProperty("Book ID") },
      required: ["id"],
    },
  },
  {
    name: "list_books",
    description: "List books in creation order, optionally filtered by title substring or author",
    inputSchema: {
      type: "object",
      properties: {
        title_filter: { type: "string", description: "Case-sensitive substring of the title" },
        author_id: idProperty("Only books written by this author"),
        ...pageProperties,
      },
    },
  },
  {
    name: "shared_authors",
    description: "Authors two books have in common",
    inputSchema: {
      type: "object",
      properties: { book_a: idProperty("First book ID"), book_b: idProperty("Second book ID") },
      required: ["book_a", "book_b"],
    },
  },
  {
    name: "shared_books",
    description: "Books two authors wrote together",
    inputSchema: {
      type: "object",
      properties: {
        author_a: idProperty("First author ID"),
        author_b: idProperty("Second author ID"),
      },
      required: ["author_a", "author_b"],
    },
  },
];
