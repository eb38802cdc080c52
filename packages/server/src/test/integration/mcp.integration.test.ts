/**
 * Protocol-level tests: a real MCP client talking to the server over an in-memory transport
 */

import { describe, it, expect, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { quietCatalog } from "@bookshelf/testkit";
import { createMcpServer } from "../../mcp.js";
import { CatalogService } from "../../service/catalog.js";
import { READ_ONLY_TOOLS } from "../../tools.js";
import { parseRate, type RateLimits } from "../../rate-limit.js";

let client: Client | undefined;

async function connect(readOnly = false, rateLimits: RateLimits = {}): Promise<Client> {
  const service = new CatalogService(quietCatalog());
  const server = createMcpServer({ service, readOnly, rateLimits });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const connected = new Client({ name: "bookshelf-test", version: "0.0.0" }, { capabilities: {} });
  await Promise.all([server.connect(serverTransport), connected.connect(clientTransport)]);
  client = connected;
  return connected;
}

function jsonOf(result: { content?: unknown; [key: string]: unknown }): unknown {
  const content = Array.isArray(result.content) ? result.content : [];
  const item: unknown = content[1];
  if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
    return JSON.parse(item.text);
  }
  return undefined;
}

async function expectMcpError(promise: Promise<unknown>, code: ErrorCode): Promise<void> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err
  );
  expect(error).toBeInstanceOf(McpError);
  if (error instanceof McpError) {
    expect(error.code).toBe(code);
  }
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe("MCP server", () => {
  it("should list every tool in read-write mode", async () => {
    const mcp = await connect();
    const { tools } = await mcp.listTools();

    expect(tools).toHaveLength(16);
    expect(tools.map((t) => t.name)).toContain("create_book");
  });

  it("should hide mutating tools in read-only mode", async () => {
    const mcp = await connect(true);
    const { tools } = await mcp.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([...READ_ONLY_TOOLS].sort());
  });

  it("should reject mutating calls in read-only mode", async () => {
    const mcp = await connect(true);
    await expectMcpError(mcp.callTool({ name: "create_author", arguments: { name: "Jane" } }), ErrorCode.InvalidRequest);
  });

  it("should round-trip an author and a book", async () => {
    const mcp = await connect();

    const author = jsonOf(await mcp.callTool({ name: "create_author", arguments: { name: "Jane Doe" } }));
    expect(author).toMatchObject({ name: "Jane Doe", book_ids: [] });
    const authorId = typeof author === "object" && author !== null && "id" in author ? author.id : undefined;

    const book = jsonOf(
      await mcp.callTool({ name: "create_book", arguments: { title: "Example", author_ids: [authorId] } })
    );
    expect(book).toMatchObject({ title: "Example", author_ids: [authorId] });

    const listing = jsonOf(await mcp.callTool({ name: "list_authors", arguments: {} }));
    expect(listing).toMatchObject({ total_count: 1 });
  });

  it("should map invalid arguments to InvalidParams", async () => {
    const mcp = await connect();
    await expectMcpError(mcp.callTool({ name: "create_author", arguments: { name: "" } }), ErrorCode.InvalidParams);
  });

  it("should reject calls beyond the global rate with InvalidRequest", async () => {
    const mcp = await connect(false, { global: parseRate("2/minute") });

    await mcp.callTool({ name: "health_check", arguments: {} });
    await mcp.callTool({ name: "service_info", arguments: {} });

    await expectMcpError(mcp.callTool({ name: "api_status", arguments: {} }), ErrorCode.InvalidRequest);
  });

  it("should map a missing author to InvalidRequest", async () => {
    const mcp = await connect();
    await expectMcpError(
      mcp.callTool({ name: "get_author", arguments: { id: "00000000-0000-4000-8000-000000000000" } }),
      ErrorCode.InvalidRequest
    );
  });

  it("should map an unknown referenced author to InvalidParams", async () => {
    const mcp = await connect();
    await expectMcpError(
      mcp.callTool({
        name: "create_book",
        arguments: { title: "Ghost", author_ids: ["00000000-0000-4000-8000-000000000000"] },
      }),
      ErrorCode.InvalidParams
    );
  });

  it("should reject unknown tools", async () => {
    const mcp = await connect();
    await expectMcpError(mcp.callTool({ name: "drop_everything", arguments: {} }), ErrorCode.MethodNotFound);
  });
});
