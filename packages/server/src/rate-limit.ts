/**
 * Fixed-window rate limits for tool calls
 *
 * Rates are written `<count>/<unit>`, e.g. "100/minute". A per-tool limit
 * counts each tool on its own; a global limit counts every call together.
 */

const UNIT_MS = {
  second: 1000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
} as const;

export type RateUnit = keyof typeof UNIT_MS;

export interface Rate {
  limit: number;
  unit: RateUnit;
  windowMs: number;
}

export interface RateLimits {
  perTool?: Rate;
  global?: Rate;
}

function isRateUnit(value: string): value is RateUnit {
  return Object.hasOwn(UNIT_MS, value);
}

/**
 * Parse "100/minute" (plural units and surrounding spaces are accepted)
 * @throws {Error} when the text is not a positive count over a known unit
 */
export function parseRate(text: string): Rate {
  const match = /^\s*(\d+)\s*\/\s*([a-z]+?)s?\s*$/i.exec(text);
  const unit = match?.[2]?.toLowerCase() ?? "";
  const limit = Number(match?.[1]);

  if (!match || !isRateUnit(unit) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new Error(`Invalid rate "${text}": expected <count>/<second|minute|hour|day>`);
  }
  return { limit, unit, windowMs: UNIT_MS[unit] };
}

export function formatRate(rate: Rate): string {
  return `${rate.limit}/${rate.unit}`;
}

/**
 * Raised by executeTool when a call exceeds a configured rate
 */
export class RateLimitError extends Error {
  readonly code = "RATE_LIMITED";

  constructor(
    public readonly tool: string,
    public readonly scope: "tool" | "global",
    public readonly rate: Rate,
    public readonly retryAfterMs: number
  ) {
    super(
      `Rate limit exceeded for ${scope === "global" ? "all tools" : `tool ${tool}`} ` +
        `(${formatRate(rate)}); retry in ${Math.ceil(retryAfterMs / 1000)}s`
    );
    this.name = "RateLimitError";
  }
}

interface Window {
  count: number;
  resetAt: number;
}

const GLOBAL_KEY = "*";

export class ToolRateLimiter {
  readonly #limits: RateLimits;
  readonly #now: () => number;
  #windows = new Map<string, Window>();

  constructor(limits: RateLimits, now: () => number = Date.now) {
    this.#limits = limits;
    this.#now = now;
  }

  get enabled(): boolean {
    return this.#limits.perTool !== undefined || this.#limits.global !== undefined;
  }

  /**
   * Count one call to `tool`
   *
   * Every applicable window is checked before any is counted, so a rejected
   * call uses no quota.
   * @throws {RateLimitError}
   */
  acquire(tool: string): void {
    const now = this.#now();
    const checks: Array<{ scope: "tool" | "global"; rate: Rate; window: Window }> = [];

    const { global, perTool } = this.#limits;
    if (global) {
      checks.push({ scope: "global", rate: global, window: this.#window(GLOBAL_KEY, global, now) });
    }
    if (perTool) {
      checks.push({ scope: "tool", rate: perTool, window: this.#window(`tool:${tool}`, perTool, now) });
    }

    for (const { scope, rate, window } of checks) {
      if (window.count >= rate.limit) {
        throw new RateLimitError(tool, scope, rate, window.resetAt - now);
      }
    }
    for (const { window } of checks) {
      window.count++;
    }
  }

  reset(): void {
    this.#windows.clear();
  }

  #window(key: string, rate: Rate, now: number): Window {
    const current = this.#windows.get(key);
    if (current && current.resetAt > now) {
      return current;
    }
    const fresh = { count: 0, resetAt: now + rate.windowMs };
    this.#windows.set(key, fresh);
    return fresh;
  }
}
