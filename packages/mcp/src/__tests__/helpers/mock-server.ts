/**
 * In-process MCP server for tests.
 * Uses @modelcontextprotocol/sdk McpServer + InMemoryTransport.
 */

import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export interface MockServerOptions {
  readonly name?: string;
  /** Echo tools to register; each replies "<tool>: <message>" */
  readonly tools?: readonly string[];
  /** Extra registration, run before the server connects */
  readonly setup?: (server: McpServer) => void;
}

/**
 * Creates a connected in-process MCP server and returns the client-side
 * transport, not yet started.
 */
export async function createMockServer(options: MockServerOptions = {}) {
  const server = new McpServer({ name: options.name ?? "test-server", version: "1.0.0" });

  for (const toolName of options.tools ?? []) {
    server.tool(
      toolName,
      `${toolName} tool`,
      { message: z.string().optional() },
      async ({ message }) => ({
        content: [{ type: "text", text: `${toolName}: ${message ?? ""}` }],
      }),
    );
  }
  options.setup?.(server);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  return { server, clientTransport, serverTransport };
}
