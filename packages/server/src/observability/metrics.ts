/**
 * Per-tool call metrics
 * Counts calls and failures by error code, and keeps a window of latency samples
 */

const WINDOW = 1000;

export interface LatencySummary {
  count: number;
  mean: number;
  p50: number;
  p95: number;
  max: number;
}

export interface ToolStats {
  calls: number;
  failures: number;
  /** Failure count keyed by error code */
  errors: Record<string, number>;
  latency: LatencySummary | null;
}

interface ToolSeries {
  calls: number;
  errors: Map<string, number>;
  samples: number[];
}

function percentile(sorted: number[], p: number): number {
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)] ?? 0;
}

export function summarizeLatency(samples: number[]): LatencySummary | null {
  if (samples.length === 0) {
    return null;
  }
  const sorted = [...samples].sort((a, b) => a - b);
  return {
    count: sorted.length,
    mean: sorted.reduce((sum, v) => sum + v, 0) / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    max: sorted[sorted.length - 1] ?? 0,
  };
}

export class ToolMetrics {
  #series = new Map<string, ToolSeries>();

  record(tool: string, durationMs: number, errCode?: string): void {
    let series = this.#series.get(tool);
    if (!series) {
      series = { calls: 0, errors: new Map(), samples: [] };
      this.#series.set(tool, series);
    }

    series.calls++;
    if (errCode !== undefined) {
      series.errors.set(errCode, (series.errors.get(errCode) ?? 0) + 1);
    }
    series.samples.push(durationMs);
    if (series.samples.length > WINDOW) {
      series.samples.shift();
    }
  }

  get(tool: string): ToolStats | undefined {
    const series = this.#series.get(tool);
    if (!series) {
      return undefined;
    }
    const errors = Object.fromEntries(series.errors);
    return {
      calls: series.calls,
      failures: Object.values(errors).reduce((sum, n) => sum + n, 0),
      errors,
      latency: summarizeLatency(series.samples),
    };
  }

  snapshot(): Record<string, ToolStats> {
    const result: Record<string, ToolStats> = {};
    for (const tool of this.#series.keys()) {
      const stats = this.get(tool);
      if (stats) {
        result[tool] = stats;
      }
    }
    return result;
  }

  reset(): void {
    this.#series.clear();
  }
}

export const metrics = new ToolMetrics();

export function recordToolExecution(
  tool: string,
  durationMs: number,
  success: boolean,
  errCode?: string
): void {
  metrics.record(tool, durationMs, success ? undefined : (errCode ?? "UNKNOWN"));
}
