/**
 * Structured event log for catalog operations
 *
 * Entries go to a sink when one is given, otherwise to the console as one
 * line each. Debug entries are dropped unless `debug` is set, which defaults
 * to the BOOKSHELF_DEBUG environment variable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  entity?: string;
  id?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/** Fields a caller may attach to an event */
export type LogFields = Omit<Partial<LogEntry>, "timestamp" | "level" | "event">;

export type LogSink = (entry: LogEntry) => void;

export interface CatalogLoggerOptions {
  sink?: LogSink;
  enabled?: boolean;
  debug?: boolean;
}

const CONSOLE: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Render an entry as `[time] [LEVEL] [event] entity/id message {details}`
 */
export function formatLogLine(entry: LogEntry): string {
  let line = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`;
  if (entry.entity || entry.id) line += ` ${entry.entity ?? ""}/${entry.id ?? ""}`;
  if (entry.message) line += ` ${entry.message}`;
  if (entry.details) line += ` ${JSON.stringify(entry.details)}`;
  return line;
}

export class CatalogLogger {
  #enabled: boolean;
  readonly #debug: boolean;
  readonly #sink: LogSink;

  constructor(options: CatalogLoggerOptions = {}) {
    this.#enabled = options.enabled ?? true;
    this.#debug = options.debug ?? Boolean(process.env.BOOKSHELF_DEBUG);
    this.#sink = options.sink ?? ((entry) => CONSOLE[entry.level](formatLogLine(entry)));
  }

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled || (level === "debug" && !this.#debug)) return;
    this.#sink({ timestamp: new Date().toISOString(), level, event, ...fields });
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  isEnabled(): boolean {
    return this.#enabled;
  }
}

/**
 * Shared logger used by catalogs opened without their own
 */
export const logger = new CatalogLogger();
