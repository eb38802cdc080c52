/**
 * Server configuration resolved from the environment
 */

import type { LogLevel } from "./observability/logger.js";
import { parseRate, type RateLimits } from "./rate-limit.js";

export interface ServerConfig {
  /** Serve only read tools */
  readOnly: boolean;
  /** When false the process exits immediately */
  enabled: boolean;
  logLevel: LogLevel;
  rateLimits: RateLimits;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level
 * Unknown values fall back to "info"
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "info";
}

/**
 * Resolve BOOKSHELF_RATE_LIMIT (per tool) and BOOKSHELF_GLOBAL_RATE_LIMIT
 * Unset, empty or "off" leaves that limit out
 * @throws {Error} on a malformed rate
 */
export function resolveRateLimits(env: NodeJS.ProcessEnv = process.env): RateLimits {
  const read = (name: string) => {
    const raw = env[name]?.trim() ?? "";
    if (raw === "" || raw.toLowerCase() === "off") return undefined;
    try {
      return parseRate(raw);
    } catch (err) {
      throw new Error(`${name}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  };

  const limits: RateLimits = {};
  const perTool = read("BOOKSHELF_RATE_LIMIT");
  const global = read("BOOKSHELF_GLOBAL_RATE_LIMIT");
  if (perTool) limits.perTool = perTool;
  if (global) limits.global = global;
  return limits;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    readOnly: env.BOOKSHELF_READONLY === "true",
    enabled: env.BOOKSHELF_ENABLED !== "false", // Default: enabled
    logLevel: resolveLogLevel(env),
    rateLimits: resolveRateLimits(env),
  };
}
