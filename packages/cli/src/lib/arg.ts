/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

const BOM = "\uFEFF";

/**
 * Parse JSON from a named source (--data, stdin, a file)
 * @throws {InvalidArgumentError} naming the source on a syntax error
 */
export function parseJson(value: string, source: string): unknown {
  const text = value.startsWith(BOM) ? value.slice(BOM.length) : value;
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Reject more than one input source
 */
export function assertSingleSource(sources: Record<string, unknown>): void {
  const given = Object.keys(sources).filter((flag) => sources[flag] !== undefined);

  if (given.length > 1) {
    throw new InvalidArgumentError(`Cannot use both ${given.join(" and ")}; choose one or use stdin`);
  }
}
