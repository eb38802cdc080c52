/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  CreateAuthorInputSchema,
  UpdateAuthorInputSchema,
  AuthorIdInputSchema,
  ListAuthorsInputSchema,
  CreateBookInputSchema,
  ListBooksInputSchema,
  SharedBooksInputSchema,
  EmptyInputSchema,
  AuthorListOutputSchema,
  BookOutputSchema,
} from "../../schemas.js";

const ID_A = "3f1c2a9e-6d1b-4c1f-9a57-2f0f5a7d9b10";
const ID_B = "a8e2c0d4-1b3f-4e6a-8c9d-0e1f2a3b4c5d";

describe("Author input schemas", () => {
  it("should accept a valid name", () => {
    expect(CreateAuthorInputSchema.parse({ name: "Jane Doe" })).toEqual({ name: "Jane Doe" });
  });

  it("should reject empty and overlong names", () => {
    expect(() => CreateAuthorInputSchema.parse({ name: "" })).toThrow(/name/);
    expect(() => CreateAuthorInputSchema.parse({ name: "x".repeat(101) })).toThrow(/name/);
    expect(() => CreateAuthorInputSchema.parse({ name: "x".repeat(100) })).not.toThrow();
  });

  it("should count name length in code points", () => {
    // each of these is one code point and two UTF-16 units
    const astral = "\u{1F4DA}";

    expect(CreateAuthorInputSchema.safeParse({ name: astral.repeat(100) }).success).toBe(true);

    const result = CreateAuthorInputSchema.safeParse({ name: astral.repeat(101) });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["name"]);
      expect(result.error.issues[0]?.message).toBe("must be at most 100 characters");
    }
  });

  it("should count title length in code points", () => {
    const title = "\u{1D11E}".repeat(200);
    expect(CreateBookInputSchema.safeParse({ title, author_ids: [ID_A] }).success).toBe(true);
    expect(CreateBookInputSchema.safeParse({ title: `${title}x`, author_ids: [ID_A] }).success).toBe(false);
  });

  it("should require a uuid id", () => {
    expect(() => AuthorIdInputSchema.parse({ id: "a1" })).toThrow(/id/);
    expect(() => UpdateAuthorInputSchema.parse({ id: ID_A, name: "New" })).not.toThrow();
  });
});

describe("List input schemas", () => {
  it("should default pagination when arguments are missing", () => {
    expect(ListAuthorsInputSchema.parse(undefined)).toEqual({ limit: 100, offset: 0 });
    expect(ListBooksInputSchema.parse({})).toEqual({ limit: 100, offset: 0 });
  });

  it("should keep filters", () => {
    expect(ListBooksInputSchema.parse({ title_filter: "Ex", author_id: ID_A, limit: 5 })).toEqual({
      title_filter: "Ex",
      author_id: ID_A,
      limit: 5,
      offset: 0,
    });
  });

  it("should reject limits outside 1-1000", () => {
    expect(() => ListAuthorsInputSchema.parse({ limit: 0 })).toThrow(/limit/);
    expect(() => ListAuthorsInputSchema.parse({ limit: 1001 })).toThrow(/limit/);
    expect(() => ListAuthorsInputSchema.parse({ limit: 2.5 })).toThrow(/limit/);
    expect(() => ListAuthorsInputSchema.parse({ limit: 1000 })).not.toThrow();
  });

  it("should reject negative offsets", () => {
    expect(() => ListBooksInputSchema.parse({ offset: -1 })).toThrow(/offset/);
  });
});

describe("Book input schemas", () => {
  it("should accept a title with authors", () => {
    expect(CreateBookInputSchema.parse({ title: "Example", author_ids: [ID_A, ID_B] })).toEqual({
      title: "Example",
      author_ids: [ID_A, ID_B],
    });
  });

  it("should reject an empty author list", () => {
    const result = CreateBookInputSchema.safeParse({ title: "Example", author_ids: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("author_ids must contain at least one author");
    }
  });

  it("should reject titles over 200 characters", () => {
    expect(() => CreateBookInputSchema.parse({ title: "t".repeat(201), author_ids: [ID_A] })).toThrow(
      /title/
    );
  });

  it("should reject non-uuid author ids", () => {
    expect(() => CreateBookInputSchema.parse({ title: "Example", author_ids: ["jane"] })).toThrow(
      /author_ids/
    );
  });
});

describe("Library and empty input schemas", () => {
  it("should require both authors", () => {
    expect(() => SharedBooksInputSchema.parse({ author_a: ID_A })).toThrow(/author_b/);
  });

  it("should accept no arguments or an empty object", () => {
    expect(() => EmptyInputSchema.parse(undefined)).not.toThrow();
    expect(() => EmptyInputSchema.parse({})).not.toThrow();
  });

  it("should reject unexpected arguments", () => {
    expect(() => EmptyInputSchema.parse({ verbose: true })).toThrow();
  });
});

describe("Output schemas", () => {
  it("should describe an author listing", () => {
    const listing = {
      authors: [{ id: ID_A, name: "Jane", book_ids: [ID_B] }],
      total_count: 1,
    };
    expect(AuthorListOutputSchema.parse(listing)).toEqual(listing);
  });

  it("should reject a book without authors", () => {
    expect(() => BookOutputSchema.parse({ id: ID_B, title: "Example", author_ids: [] })).toThrow();
  });
});
