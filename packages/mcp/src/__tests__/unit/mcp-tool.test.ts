import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { McpToolCallFailedError } from "@toolmesh/errors";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createMcpTool, extractText } from "../../adapter/mcp-tool.js";
import type { McpLogger } from "../../logger.js";
import { SAMPLE_TOOL } from "../helpers/fixtures.js";
import { createMockServer } from "../helpers/mock-server.js";

function registerTestTools(server: McpServer): void {
  server.tool("greet", "Greet someone", { name: z.string() }, async ({ name }) => ({
    content: [
      { type: "text", text: `Hello, ${name}!` },
      { type: "image", data: "aGVsbG8=", mimeType: "image/png" },
      { type: "text", text: "Have a nice day." },
    ],
  }));
  server.tool("silent", "Returns no text", async () => ({
    content: [{ type: "image", data: "aGVsbG8=", mimeType: "image/png" }],
  }));
  server.tool("broken", "Always reports an error", async () => ({
    content: [{ type: "text", text: "disk full" }],
    isError: true,
  }));
}

describe("createMcpTool", () => {
  let client: Client;
  let server: McpServer;
  let logger: McpLogger & { info: Mock; warn: Mock };

  beforeEach(async () => {
    const mock = await createMockServer({ setup: registerTestTools });
    server = mock.server;
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(mock.clientTransport);
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("exposes name, description, server and normalized schema", () => {
    const tool = createMcpTool("weather", SAMPLE_TOOL, client, { logger });

    expect(tool.name).toBe("get_weather");
    expect(tool.description).toBe("Get weather for a location");
    expect(tool.serverName).toBe("weather");
    expect(tool.inputSchema.properties).toEqual({
      city: { type: "string" },
      days: { anyOf: [{ type: "integer" }, { type: "null" }] },
    });
    expect(Object.isFrozen(tool)).toBe(true);
  });

  it("defaults a missing description to empty", () => {
    const tool = createMcpTool("s", { name: "bare", inputSchema: { type: "object" } }, client, {
      logger,
    });
    expect(tool.description).toBe("");
  });

  it("joins text parts with blank lines", async () => {
    const tool = createMcpTool("s", { name: "greet", inputSchema: { type: "object" } }, client, {
      logger,
    });

    await expect(tool.invoke({ name: "Ada" })).resolves.toBe("Hello, Ada!\n\nHave a nice day.");
    expect(logger.info).toHaveBeenCalledWith('MCP tool "s"/"greet" received input: {"name":"Ada"}');
    expect(logger.info).toHaveBeenCalledWith('MCP tool "s"/"greet" received result (size: 29)');
  });

  it("returns a placeholder when there is no text content", async () => {
    const tool = createMcpTool("s", { name: "silent", inputSchema: { type: "object" } }, client, {
      logger,
    });
    await expect(tool.invoke()).resolves.toBe("No text content available in response");
  });

  it("throws McpToolCallFailedError when the tool reports an error", async () => {
    const tool = createMcpTool("s", { name: "broken", inputSchema: { type: "object" } }, client, {
      logger,
    });

    await expect(tool.invoke()).rejects.toThrow(
      new McpToolCallFailedError("s", "broken", "disk full"),
    );
    expect(logger.warn).toHaveBeenCalledOnce();
  });

  it("wraps protocol errors", async () => {
    const tool = createMcpTool("s", { name: "missing", inputSchema: { type: "object" } }, client, {
      logger,
    });
    await expect(tool.invoke()).rejects.toThrow(McpToolCallFailedError);
  });

  it("returns the error text when handleToolErrors is set", async () => {
    const tool = createMcpTool("s", { name: "broken", inputSchema: { type: "object" } }, client, {
      logger,
      handleToolErrors: true,
    });

    await expect(tool.invoke()).resolves.toBe(
      'Error executing MCP tool: MCP tool "s"/"broken" call failed: disk full',
    );
  });
});

describe("extractText", () => {
  it("ignores non-array content", () => {
    expect(extractText(undefined)).toBe("");
  });

  it("skips malformed items", () => {
    expect(extractText([{ type: "text" }, { type: "text", text: "ok" }, null])).toBe("ok");
  });
});
