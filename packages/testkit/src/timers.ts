/**
 * Timing helpers for benchmarks and concurrency tests
 */

import { performance } from "node:perf_hooks";

export interface Timed<T> {
  value: T;
  ms: number;
}

export async function measure<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = performance.now();
  const value = await fn();
  return { value, ms: performance.now() - start };
}

/**
 * Resolve after pending microtasks and I/O callbacks have run
 */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
