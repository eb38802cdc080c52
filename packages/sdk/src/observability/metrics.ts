/**
 * Metrics tracking for catalog operations
 */

export interface OperationMetrics {
  calls: number;
  failures: number;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

export class CatalogMetrics {
  #metrics = new Map<string, OperationMetrics>();

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(operation: string): OperationMetrics {
    let metrics = this.#metrics.get(operation);
    if (!metrics) {
      metrics = { calls: 0, failures: 0, durationMs: [] };
      this.#metrics.set(operation, metrics);
    }
    return metrics;
  }

  /**
   * Record one completed call
   */
  record(operation: string, ms: number, success: boolean): void {
    const metrics = this.#getMetrics(operation);
    metrics.calls++;
    if (!success) {
      metrics.failures++;
    }
    metrics.durationMs.push(ms);

    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  getMetrics(operation: string): OperationMetrics | undefined {
    return this.#metrics.get(operation);
  }

  getAllMetrics(): Map<string, OperationMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95Duration(operation: string): number {
    return this.getP95(this.#metrics.get(operation)?.durationMs ?? []);
  }

  /**
   * Reset metrics for one operation, or all of them
   */
  reset(operation?: string): void {
    if (operation) {
      this.#metrics.delete(operation);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Shared metrics collector used by catalogs opened without their own
 */
export const metrics = new CatalogMetrics();
