import { describe, it, expect, beforeEach } from "vitest";
import { openCatalog } from "./catalog.js";
import { CatalogLogger } from "./observability/logs.js";
import { CatalogMetrics } from "./observability/metrics.js";
import { InvalidArgumentError, NotFoundError, ValidationError } from "./errors.js";
import { sequenceIds } from "./ids.js";
import type { Catalog } from "./types.js";

const IDS = ["a1", "a2", "a3", "b1", "b2", "b3", "b4", "b5"];

describe("Book operations", () => {
  let catalog: Catalog;

  beforeEach(async () => {
    const logger = new CatalogLogger();
    logger.setEnabled(false);
    catalog = openCatalog({ idGenerator: sequenceIds(IDS), logger, metrics: new CatalogMetrics() });

    await catalog.authors.create("Jane Doe");
    await catalog.authors.create("John Smith");
    await catalog.authors.create("Janet Jones");
  });

  describe("create()", () => {
    it("should create a book and link every author", async () => {
      const book = await catalog.books.create("Example", ["a1", "a2"]);

      expect(book).toEqual({ id: "b1", title: "Example", author_ids: ["a1", "a2"] });
      expect((await catalog.authors.get("a1")).book_ids).toEqual(["b1"]);
      expect((await catalog.authors.get("a2")).book_ids).toEqual(["b1"]);
      expect((await catalog.authors.get("a3")).book_ids).toEqual([]);
    });

    it("should collapse duplicate author ids", async () => {
      const book = await catalog.books.create("Example", ["a2", "a1", "a2"]);
      expect(book.author_ids).toEqual(["a2", "a1"]);
    });

    it("should reject an empty title", async () => {
      await expect(catalog.books.create("", ["a1"])).rejects.toThrow(ValidationError);
    });

    it("should reject a title longer than 200 characters", async () => {
      await expect(catalog.books.create("t".repeat(201), ["a1"])).rejects.toThrow(
        "Validation failed: title: must be at most 200 characters"
      );
    });

    it("should reject an empty author list", async () => {
      await expect(catalog.books.create("T", [])).rejects.toThrow(
        "Validation failed: author_ids: must contain at least one author"
      );
    });

    it("should name the missing author and create nothing", async () => {
      const attempt = catalog.books.create("T", ["a1", "ghost"]);

      await expect(attempt).rejects.toThrow(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ entity: "author", id: "ghost", reference: true, status: 422 });
      expect((await catalog.books.list()).total_count).toBe(0);
      expect((await catalog.authors.get("a1")).book_ids).toEqual([]);
    });
  });

  describe("get()", () => {
    it("should throw NotFoundError for an unknown id", async () => {
      await expect(catalog.books.get("nope")).rejects.toMatchObject({
        name: "NotFoundError",
        entity: "book",
        reference: false,
        status: 404,
      });
    });
  });

  describe("update()", () => {
    beforeEach(async () => {
      await catalog.books.create("Example", ["a1", "a2"]);
    });

    it("should replace title and authors and relink both sides", async () => {
      const book = await catalog.books.update("b1", "Example, Revised", ["a2", "a3"]);

      expect(book).toEqual({ id: "b1", title: "Example, Revised", author_ids: ["a2", "a3"] });
      expect((await catalog.authors.get("a1")).book_ids).toEqual([]);
      expect((await catalog.authors.get("a2")).book_ids).toEqual(["b1"]);
      expect((await catalog.authors.get("a3")).book_ids).toEqual(["b1"]);
    });

    it("should reject an empty author list and leave the book unchanged", async () => {
      await expect(catalog.books.update("b1", "Example", [])).rejects.toThrow(ValidationError);
      expect(await catalog.books.get("b1")).toEqual({ id: "b1", title: "Example", author_ids: ["a1", "a2"] });
    });

    it("should apply nothing when one new author is missing", async () => {
      await expect(catalog.books.update("b1", "New Title", ["a3", "ghost"])).rejects.toMatchObject({
        entity: "author",
        id: "ghost",
        reference: true,
      });

      expect(await catalog.books.get("b1")).toEqual({ id: "b1", title: "Example", author_ids: ["a1", "a2"] });
      expect((await catalog.authors.get("a1")).book_ids).toEqual(["b1"]);
      expect((await catalog.authors.get("a3")).book_ids).toEqual([]);
    });

    it("should report a missing book as the target", async () => {
      await expect(catalog.books.update("b9", "T", ["a1"])).rejects.toMatchObject({
        entity: "book",
        id: "b9",
        reference: false,
      });
    });
  });

  describe("list()", () => {
    beforeEach(async () => {
      await catalog.books.create("Alpha", ["a1"]);
      await catalog.books.create("Beta", ["a2"]);
      await catalog.books.create("Alphabet", ["a1", "a2"]);
      await catalog.books.create("Gamma", ["a3"]);
      await catalog.books.create("Delta", ["a1"]);
    });

    it("should return the 4th and 5th inserted for limit 2 offset 3", async () => {
      const result = await catalog.books.list({ limit: 2, offset: 3 });
      expect(result.books.map((b) => b.id)).toEqual(["b4", "b5"]);
      expect(result.total_count).toBe(5);
    });

    it("should filter by title substring", async () => {
      const result = await catalog.books.list({ title_filter: "Alpha" });
      expect(result.books.map((b) => b.title)).toEqual(["Alpha", "Alphabet"]);
      expect(result.total_count).toBe(2);
    });

    it("should filter by author", async () => {
      const result = await catalog.books.list({ author_id: "a1" });
      expect(result.books.map((b) => b.title)).toEqual(["Alpha", "Alphabet", "Delta"]);
    });

    it("should AND both filters", async () => {
      const result = await catalog.books.list({ title_filter: "Alpha", author_id: "a2" });
      expect(result.books.map((b) => b.title)).toEqual(["Alphabet"]);
      expect(result.total_count).toBe(1);
    });

    it("should return an empty page for an unknown author", async () => {
      expect(await catalog.books.list({ author_id: "ghost" })).toEqual({ books: [], total_count: 0 });
    });

    it("should return identical results when called twice without mutation", async () => {
      const first = await catalog.books.list();
      const second = await catalog.books.list();
      expect(second).toEqual(first);
    });

    it("should reject out-of-range pagination", async () => {
      await expect(catalog.books.list({ limit: 1001 })).rejects.toThrow(InvalidArgumentError);
      await expect(catalog.books.list({ offset: -5 })).rejects.toThrow(InvalidArgumentError);
    });
  });

  describe("delete()", () => {
    it("should unlink the book from every author before removing it", async () => {
      await catalog.books.create("Example", ["a1", "a2"]);
      await catalog.books.create("Other", ["a1"]);

      await catalog.books.delete("b1");

      await expect(catalog.books.get("b1")).rejects.toThrow(NotFoundError);
      expect((await catalog.authors.get("a1")).book_ids).toEqual(["b2"]);
      expect((await catalog.authors.get("a2")).book_ids).toEqual([]);
    });

    it("should fail with NotFoundError every time for a missing id", async () => {
      await expect(catalog.books.delete("b1")).rejects.toThrow(NotFoundError);
      await expect(catalog.books.delete("b1")).rejects.toThrow(NotFoundError);
    });
  });
});
