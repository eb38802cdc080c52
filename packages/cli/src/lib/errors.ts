/**
 * CLI error handling and exit code mapping
 */

import { toBoundarySignal } from "@bookshelf/sdk";

/**
 * Usage or input error raised by the CLI itself
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * A plan step that failed; the catalog error is kept as `cause`
 */
export class StepFailedError extends CliError {
  constructor(
    public readonly step: number,
    public readonly op: string,
    cause: unknown
  ) {
    super(`step ${step} (${op}): ${cause instanceof Error ? cause.message : String(cause)}`, {
      exitCode: mapSdkErrorToExitCode(cause),
      cause,
    });
    this.name = "StepFailedError";
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: entity not found
 * - 3: conflict (author still has books)
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  switch (toBoundarySignal(error).kind) {
    case "not_found":
      return 2;
    case "conflict":
      return 3;
    default:
      return 1;
  }
}

const MAX_MESSAGE = 2000;

/**
 * One message line; verbose mode adds the cause and the stack
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const { message } = error;
  const lines = [message.length > MAX_MESSAGE ? `${message.slice(0, MAX_MESSAGE)}... (truncated)` : message];
  if (verbose) {
    if (error.cause instanceof Error) lines.push(`  Cause: ${error.cause.name}: ${error.cause.message}`);
    if (error.stack) lines.push(error.stack);
  }
  return lines.join("\n");
}
