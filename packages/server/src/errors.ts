/**
 * Translation of thrown values into MCP protocol errors
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { CatalogError, toBoundarySignal } from "@bookshelf/sdk";
import { z } from "zod";
import { RateLimitError } from "./rate-limit.js";

/**
 * Raised by executeTool when a handler outlives its budget
 */
export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export interface McpErrorShape {
  code: number;
  message: string;
}

/**
 * Stable error code for logs and metrics
 */
export function errorCodeOf(error: unknown): string {
  if (error instanceof z.ZodError) {
    return "VALIDATION_ERROR";
  }
  if (error instanceof CatalogError || error instanceof ToolTimeoutError || error instanceof RateLimitError) {
    return error.code;
  }
  return "UNKNOWN";
}

export function mapErrorToMcp(error: unknown): McpErrorShape {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof RateLimitError) {
    return { code: ErrorCode.InvalidRequest, message: error.message };
  }

  const signal = toBoundarySignal(error);
  switch (signal.kind) {
    case "bad_request":
    case "unprocessable":
      return { code: ErrorCode.InvalidParams, message: signal.message };
    case "not_found":
    case "conflict":
      return { code: ErrorCode.InvalidRequest, message: signal.message };
    case "internal":
      return { code: ErrorCode.InternalError, message: signal.message };
  }
}
