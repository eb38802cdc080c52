/**
 * Verbose-mode metric lines on stderr
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

export type MetricFields = Record<string, string | number | boolean>;

// A metric is one line; embedded line breaks would split it
const oneLine = (part: string | number | boolean): string => String(part).replace(/[\r\n]+/g, " ").trim();

/**
 * Render `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: MetricFields): string {
  return [`metric ${oneLine(key)}`, ...Object.entries(fields).map(([name, value]) => `${oneLine(name)}=${oneLine(value)}`)].join(
    " "
  );
}

/**
 * Write a metric line when `verbose`; the default reads BOOKSHELF_CLI_DEBUG
 */
export function emitMetric(key: string, fields: MetricFields, verbose = isVerbose()): void {
  if (!verbose) return;
  writeStderr(`${formatMetric(key, fields)}\n`);
}

/**
 * Time a command body and emit `duration_ms` and `outcome` when it settles
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>, verbose = isVerbose()): Promise<T> {
  const startedAt = performance.now();
  let outcome: "ok" | "error" = "error";

  try {
    const result = await fn();
    outcome = "ok";
    return result;
  } finally {
    emitMetric(label, { duration_ms: Math.round(performance.now() - startedAt), outcome }, verbose);
  }
}
