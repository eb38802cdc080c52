/**
 * Timing checks for catalog operations
 * Run with: npm run bench
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CatalogMetrics } from "@bookshelf/sdk";
import type { Catalog } from "@bookshelf/sdk";
import { quietCatalog, seedCatalog } from "../src/catalog.js";
import { measure } from "../src/timers.js";

describe("Catalog timings", () => {
  let catalog: Catalog;
  let metrics: CatalogMetrics;

  beforeEach(() => {
    metrics = new CatalogMetrics();
    catalog = quietCatalog({ metrics });
  });

  it("1000 authors, 5000 books - create p95 < 5ms", { timeout: 30000 }, async () => {
    await seedCatalog(catalog, { authors: 1000, books: 5000, authorsPerBook: 2 });

    console.log(`author.create p95: ${metrics.getP95Duration("author.create").toFixed(3)}ms`);
    console.log(`book.create p95: ${metrics.getP95Duration("book.create").toFixed(3)}ms`);
    expect(metrics.getP95Duration("book.create")).toBeLessThan(5);
  });

  it("filtered listing over 10000 books < 50ms", { timeout: 30000 }, async () => {
    const author = await catalog.authors.create("Prolific");
    for (let i = 0; i < 10000; i++) {
      await catalog.books.create(i % 10 === 0 ? `Atlas ${i}` : `Book ${i}`, [author.id]);
    }

    const { value, ms } = await measure(() => catalog.books.list({ title_filter: "Atlas", limit: 1000 }));

    console.log(`book.list (title filter): ${ms.toFixed(2)}ms`);
    expect(value.total_count).toBe(1000);
    expect(ms).toBeLessThan(50);
  });
});
