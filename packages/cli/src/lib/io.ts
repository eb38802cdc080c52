/**
 * Plan input and diagnostic output
 */

import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { InvalidArgumentError } from "commander";
import { parseJson } from "./arg.js";

export const MAX_PLAN_BYTES = 10 * 1024 * 1024;

export interface PlanSource {
  file?: string;
  data?: string;
}

/**
 * Collect a stream as UTF-8 text, refusing more than `maxBytes`
 */
export async function readStream(stream: Readable, maxBytes = MAX_PLAN_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    total += buf.length;
    if (total > maxBytes) {
      stream.destroy();
      throw new InvalidArgumentError(`Plan input exceeds ${maxBytes} bytes`);
    }
    chunks.push(buf);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Load the plan document from --file, --data or piped stdin, in that order
 */
export async function readJsonInput(source: PlanSource, stdin: Readable & { isTTY?: boolean } = process.stdin): Promise<unknown> {
  if (source.file !== undefined) {
    return parseJson(await readFile(source.file, "utf8"), `file ${source.file}`);
  }
  if (source.data !== undefined) {
    return parseJson(source.data, "--data");
  }

  if (stdin.isTTY) {
    throw new InvalidArgumentError("No plan given: use --file, --data or pipe JSON to stdin");
  }
  const text = await readStream(stdin);
  if (text.trim() === "") {
    throw new InvalidArgumentError("Plan on stdin is empty");
  }
  return parseJson(text, "stdin");
}

export function writeStderr(content: string): void {
  process.stderr.write(content);
}
