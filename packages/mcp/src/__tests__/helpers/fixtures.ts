/**
 * Canned server entries for MCP tests.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

export const STDIO_CONFIG = {
  command: "node",
  args: ["server.js"],
  env: { FOO: "bar" },
  cwd: "/tmp",
} as const;

export const MINIMAL_STDIO_CONFIG = {
  command: "echo",
  args: ["hi"],
} as const;

export const HTTP_URL = "https://remote.test/mcp";
export const SSE_URL = "https://legacy.test/sse";
export const WS_URL = "wss://socket.test/mcp";

export const HTTP_CONFIG = {
  url: HTTP_URL,
  headers: { Authorization: "Bearer test-secret" },
} as const;

export const SAMPLE_TOOL = {
  name: "get_weather",
  description: "Get weather for a location",
  inputSchema: {
    type: "object",
    properties: {
      city: { type: "string" },
      days: { type: ["integer", "null"] },
    },
    required: ["city"],
  },
} satisfies Tool;
