/**
 * Structured logging to stderr for MCP server observability
 * stdout is reserved for protocol frames, so every line goes to stderr
 */

import { CatalogLogger } from "@bookshelf/sdk";
import { resolveLogLevel } from "../config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

/** Receives one serialized JSON line per event */
export type LogWriter = (line: string) => void;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const toStderr: LogWriter = (line) => console.error(line);

export class Logger {
  readonly minLevel: LogLevel;
  #write: LogWriter;
  #bindings: Record<string, unknown>;

  constructor(minLevel: LogLevel = "info", write: LogWriter = toStderr, bindings: Record<string, unknown> = {}) {
    this.minLevel = minLevel;
    this.#write = write;
    this.#bindings = bindings;
  }

  /**
   * Logger that adds `bindings` to every event
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.minLevel, this.#write, { ...this.#bindings, ...bindings });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...this.#bindings,
      ...data,
    };
    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  toolCall(tool: string, duration_ms: number, success: boolean, err?: { code: string; message: string }): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: err?.code ?? "UNKNOWN",
        err_message: err?.message ?? "unknown error",
      });
    }
  }
}

export const logger = new Logger(resolveLogLevel());

/**
 * Catalog logger that forwards SDK events into a server logger
 */
export function bridgeCatalogLogger(target: Logger = logger.child({ component: "catalog" })): CatalogLogger {
  return new CatalogLogger({
    sink: ({ level, event, entity, id, message, details }) => target.log(level, event, { entity, id, message, details }),
  });
}
