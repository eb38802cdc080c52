import { describe, it, expect, vi, afterEach } from "vitest";
import { openCatalog } from "./catalog.js";
import { CatalogLogger, formatLogLine } from "./observability/logs.js";
import { CatalogMetrics } from "./observability/metrics.js";

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("CatalogLogger", () => {
  it("should format info events on stdout", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-02T03:04:05.000Z"));
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    new CatalogLogger().info("author.created", { entity: "author", id: "a1" });

    expect(spy).toHaveBeenCalledWith("[2026-01-02T03:04:05.000Z] [INFO] [author.created] author/a1");
  });

  it("should append message and details", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});

    new CatalogLogger().warn("book.create.rejected", { message: "nope", details: { status: 422 } });

    const line = spy.mock.calls[0]?.[0];
    expect(line).toMatch(/\[WARN\] \[book\.create\.rejected\] nope \{"status":422\}$/);
  });

  it("should stay silent when disabled", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new CatalogLogger();
    log.setEnabled(false);

    log.error("anything");
    expect(spy).not.toHaveBeenCalled();
    expect(log.isEnabled()).toBe(false);
  });

  it("should hand entries to a sink instead of the console", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-02T03:04:05.000Z"));
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const sink = vi.fn();

    new CatalogLogger({ sink }).info("book.deleted", { entity: "book", id: "b1" });

    expect(sink).toHaveBeenCalledWith({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "info",
      event: "book.deleted",
      entity: "book",
      id: "b1",
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it("should drop debug entries unless debugging is switched on", () => {
    vi.stubEnv("BOOKSHELF_DEBUG", "");
    const sink = vi.fn();

    new CatalogLogger({ sink }).debug("author.listed");

    expect(sink).not.toHaveBeenCalled();
    vi.unstubAllEnvs();
  });

  it("should pass debug entries when asked to", () => {
    const sink = vi.fn();

    new CatalogLogger({ sink, debug: true }).debug("author.listed", { details: { total: 2 } });

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0]?.[0]).toMatchObject({ level: "debug", event: "author.listed", details: { total: 2 } });
  });

  it("should start disabled when constructed so", () => {
    const sink = vi.fn();
    const log = new CatalogLogger({ sink, enabled: false });

    log.error("book.create.failed");
    log.setEnabled(true);
    log.error("book.create.failed");

    expect(sink).toHaveBeenCalledTimes(1);
  });
});

describe("formatLogLine", () => {
  it("should leave out fields that are absent", () => {
    expect(formatLogLine({ timestamp: "t", level: "error", event: "catalog.failed" })).toBe(
      "[t] [ERROR] [catalog.failed]"
    );
  });

  it("should show a lone id with an empty entity", () => {
    expect(formatLogLine({ timestamp: "t", level: "info", event: "x", id: "b1", message: "ok" })).toBe("[t] [INFO] [x] /b1 ok");
  });
});

describe("CatalogMetrics", () => {
  it("should count calls and failures per operation", () => {
    const m = new CatalogMetrics();
    m.record("author.create", 3, true);
    m.record("author.create", 5, false);

    expect(m.getMetrics("author.create")).toEqual({ calls: 2, failures: 1, durationMs: [3, 5] });
  });

  it("should keep the last 100 samples", () => {
    const m = new CatalogMetrics();
    for (let i = 1; i <= 150; i++) {
      m.record("book.list", i, true);
    }

    const samples = m.getMetrics("book.list")?.durationMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(51);
  });

  it("should compute p95", () => {
    const m = new CatalogMetrics();
    expect(m.getP95([])).toBe(0);
    expect(m.getP95(Array.from({ length: 20 }, (_, i) => i + 1))).toBe(19);
  });

  it("should reset one operation or all", () => {
    const m = new CatalogMetrics();
    m.record("a", 1, true);
    m.record("b", 1, true);

    m.reset("a");
    expect(m.getMetrics("a")).toBeUndefined();
    expect(m.getAllMetrics().size).toBe(1);

    m.reset();
    expect(m.getAllMetrics().size).toBe(0);
  });
});

describe("Catalog instrumentation", () => {
  it("should record every operation and log rejections", async () => {
    const logger = new CatalogLogger();
    const metrics = new CatalogMetrics();
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "info").mockImplementation(() => {});
    const catalog = openCatalog({ logger, metrics });

    await catalog.authors.create("Jane Doe");
    await expect(catalog.authors.get("missing")).rejects.toThrow();

    expect(metrics.getMetrics("author.create")).toMatchObject({ calls: 1, failures: 0 });
    expect(metrics.getMetrics("author.get")).toMatchObject({ calls: 1, failures: 1 });
    expect(warn).toHaveBeenCalledWith("author.get.rejected", {
      message: "Author not found: missing",
      details: { code: "NOT_FOUND", status: 404 },
    });
  });

  it("should record catalog stats like any other read", async () => {
    const metrics = new CatalogMetrics();
    const catalog = openCatalog({ logger: new CatalogLogger({ enabled: false }), metrics });

    await catalog.stats();
    await catalog.stats();

    expect(metrics.getMetrics("catalog.stats")).toMatchObject({ calls: 2, failures: 0 });
  });
});
