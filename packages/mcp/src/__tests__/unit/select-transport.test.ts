import { McpHttpStatusError } from "@toolmesh/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { McpServerConfigInput } from "../../config/types.js";
import { validateServerConfig } from "../../config/validate.js";
import type { McpLogger } from "../../logger.js";
import { buildChildEnv, selectTransport } from "../../transport/select-transport.js";

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies McpLogger;
}

function select(config: McpServerConfigInput, logger: McpLogger = mockLogger()) {
  return selectTransport("srv", validateServerConfig("srv", config, logger), { logger });
}

function deprecationWarnings(logger: ReturnType<typeof mockLogger>): unknown[] {
  return logger.warn.mock.calls.filter(([message]) => String(message).includes("deprecated"));
}

describe("buildChildEnv", () => {
  it("injects the ambient PATH when absent", () => {
    expect(buildChildEnv({ FOO: "bar" }, "/usr/bin")).toEqual({ FOO: "bar", PATH: "/usr/bin" });
  });

  it("never overwrites an explicit PATH", () => {
    expect(buildChildEnv({ PATH: "/opt/bin" }, "/usr/bin")).toEqual({ PATH: "/opt/bin" });
  });

  it("uses an empty PATH when there is no ambient one", () => {
    expect(buildChildEnv({}, undefined)).toEqual({ PATH: "" });
  });

  it("does not mutate the configured env", () => {
    const env = { FOO: "bar" };
    buildChildEnv(env, "/usr/bin");
    expect(env).toEqual({ FOO: "bar" });
  });
});

describe("selectTransport", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.unstubAllEnvs();
  });

  it("selects stdio for a command without touching the network", async () => {
    vi.stubEnv("PATH", "/usr/test/bin");
    const fetchMock = vi.fn();
    globalThis.fetch = fetchMock;

    const selection = await select({ command: "echo", args: ["hi"], errlog: "ignore" });

    expect(selection).toEqual({
      kind: "stdio",
      params: {
        command: "echo",
        args: ["hi"],
        env: { PATH: "/usr/test/bin" },
        cwd: undefined,
        stderr: "ignore",
      },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("honours an explicit streamable_http transport without probing", async () => {
    const fetchMock = vi.fn();
    globalThis.fetch = fetchMock;

    const selection = await select({
      url: "https://remote.test/mcp",
      transport: "http",
      headers: { "X-Api-Key": "test-secret" },
    });

    expect(selection.kind).toBe("streamable_http");
    if (selection.kind !== "streamable_http") return;
    expect(selection.detected).toBe(false);
    expect(selection.options.headers).toEqual({ "X-Api-Key": "test-secret" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("selects sse when asked and warns about deprecation once", async () => {
    const logger = mockLogger();
    const selection = await select({ url: "https://legacy.test/sse", type: "sse" }, logger);

    expect(selection.kind).toBe("sse");
    expect(deprecationWarnings(logger)).toHaveLength(1);
  });

  it("selects streamable_http when the probe succeeds", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
    const logger = mockLogger();

    const selection = await select({ url: "https://remote.test/mcp" }, logger);

    expect(selection.kind).toBe("streamable_http");
    if (selection.kind !== "streamable_http") return;
    expect(selection.detected).toBe(true);
    expect(deprecationWarnings(logger)).toHaveLength(0);
  });

  it("falls back to sse on a 4xx probe and warns once", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(null, { status: 405 }));
    const logger = mockLogger();

    const selection = await select({ url: "https://legacy.test/sse" }, logger);

    expect(selection.kind).toBe("sse");
    if (selection.kind !== "sse") return;
    expect(selection.detected).toBe(true);
    expect(deprecationWarnings(logger)).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith(
      'MCP server "srv": received 4xx error, falling back to SSE transport',
    );
  });

  it("propagates probe failures", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(null, { status: 500 }));
    await expect(select({ url: "https://remote.test/mcp" })).rejects.toThrow(McpHttpStatusError);
  });

  it("auto-detects with a warning for an unknown transport name", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
    const logger = mockLogger();

    const selection = await select({ url: "https://remote.test/mcp", transport: "grpc" }, logger);

    expect(selection.kind).toBe("streamable_http");
    expect(logger.warn).toHaveBeenCalledWith(
      'MCP server "srv": Unknown transport type "grpc", auto-detecting',
    );
  });

  it("selects websocket for ws URLs", async () => {
    const selection = await select({
      url: "wss://socket.test/mcp",
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(selection).toEqual({
      kind: "websocket",
      url: new URL("wss://socket.test/mcp"),
      options: { headers: { Authorization: "Bearer test-secret" }, handshakeTimeoutMs: 30_000 },
    });
  });

  it("warns when a ws URL carries a non-socket transport name", async () => {
    const logger = mockLogger();
    const selection = await select({ url: "ws://socket.test", transport: "grpc" }, logger);

    expect(selection.kind).toBe("websocket");
    expect(logger.warn).toHaveBeenCalledWith(
      'MCP server "srv": URL scheme "ws" suggests WebSocket, but transport "grpc" specified',
    );
  });
});
