#!/usr/bin/env node

/**
 * MCP server for the Bookshelf catalog
 * Exposes author and book operations via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { openCatalog } from "@bookshelf/sdk";
import { loadConfig } from "./config.js";
import { createMcpServer } from "./mcp.js";
import { CatalogService } from "./service/catalog.js";
import { bridgeCatalogLogger, logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";
import { formatRate } from "./rate-limit.js";

async function main(): Promise<void> {
  // Any stray console.log/info/debug on stdout would corrupt protocol frames
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadConfig();

  if (!config.enabled) {
    console.error("Bookshelf server is disabled (BOOKSHELF_ENABLED=false)");
    process.exit(0);
  }

  const service = new CatalogService(openCatalog({ logger: bridgeCatalogLogger() }));
  const server = createMcpServer({ service, readOnly: config.readOnly, rateLimits: config.rateLimits });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    log_level: config.logLevel,
    rate_limit: config.rateLimits.perTool ? formatRate(config.rateLimits.perTool) : "off",
    global_rate_limit: config.rateLimits.global ? formatRate(config.rateLimits.global) : "off",
  });

  const shutdown = async () => {
    logger.info("server.shutdown", { tools: metrics.snapshot() });
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
