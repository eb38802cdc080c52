/**
 * Catalog adapter for CLI
 * Keeps stdout for results: SDK events go to stderr, and only in verbose mode
 */

import { CatalogLogger, CatalogMetrics, openCatalog } from "@bookshelf/sdk";
import type { Catalog, LogEntry } from "@bookshelf/sdk";
import { writeStderr } from "./io.js";
import { emitMetric } from "./telemetry.js";

export interface CliCatalog {
  catalog: Catalog;
  metrics: CatalogMetrics;
}

function formatEntry(entry: LogEntry): string {
  const target = entry.entity !== undefined || entry.id !== undefined ? ` ${entry.entity ?? ""}/${entry.id ?? ""}` : "";
  const message = entry.message !== undefined ? ` ${entry.message}` : "";
  return `${entry.level} ${entry.event}${target}${message}\n`;
}

export function openCliCatalog(verbose: boolean): CliCatalog {
  const logger = new CatalogLogger({ sink: (entry) => writeStderr(formatEntry(entry)), enabled: verbose });

  const metrics = new CatalogMetrics();
  return { catalog: openCatalog({ logger, metrics }), metrics };
}

/**
 * Emit one metric line per SDK operation when `verbose`
 */
export function emitCatalogMetrics(metrics: CatalogMetrics, verbose: boolean): void {
  for (const [operation, stats] of metrics.getAllMetrics()) {
    emitMetric(`sdk.${operation}`, {
      calls: stats.calls,
      failures: stats.failures,
      p95_ms: metrics.getP95(stats.durationMs),
    }, verbose);
  }
}
