/**
 * Output rendering helpers
 */

const ANSI = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
} as const;

const RESET = "\x1b[0m";

export type Color = keyof typeof ANSI;

export interface JsonOutputOptions {
  /** One line, no indentation */
  raw?: boolean;
}

export function renderJson(data: unknown, options: JsonOutputOptions = {}): string {
  return options.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
}

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown, options?: JsonOutputOptions): void {
  console.log(renderJson(data, options));
}

/**
 * Wrap text in an ANSI color when the stream is a terminal
 */
export function colorize(text: string, color: Color, stream: { isTTY?: boolean } = process.stdout): string {
  return stream.isTTY ? `${ANSI[color]}${text}${RESET}` : text;
}
