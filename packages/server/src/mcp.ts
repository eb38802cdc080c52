/**
 * MCP protocol wiring: tool listing, dispatch and error translation
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { CatalogService, SERVICE_NAME, SERVICE_VERSION } from "./service/catalog.js";
import { READ_ONLY_TOOLS, createToolHandlers, isToolName, toolDefinitions } from "./tools.js";
import { errorCodeOf, mapErrorToMcp } from "./errors.js";
import { ToolRateLimiter, type RateLimits } from "./rate-limit.js";
import { logger } from "./observability/logger.js";

export interface McpServerOptions {
  service: CatalogService;
  /** Hide and reject every tool that changes the catalog */
  readOnly?: boolean;
  /** Per-tool and global call rates; omitted limits are not enforced */
  rateLimits?: RateLimits;
}

export function createMcpServer({ service, readOnly = false, rateLimits = {} }: McpServerOptions): Server {
  const limiter = new ToolRateLimiter(rateLimits);
  const handlers = createToolHandlers(service, limiter.enabled ? limiter : undefined);

  const server = new Server(
    {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((t) => READ_ONLY_TOOLS.includes(t.name))
      : toolDefinitions;

    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      if (readOnly && !READ_ONLY_TOOLS.includes(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handlers[name](args);
    } catch (error) {
      if (error instanceof McpError) {
        logger.warn("server.tool.rejected", { tool: name, err_code: error.code, err_message: error.message });
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCodeOf(error),
        err_message: message,
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw new McpError(code, message);
    }
  });

  return server;
}
