import { describe, expect, it } from "vitest";
import {
  convertMcpToTools,
  createConsoleLogger,
  DEFAULT_CLIENT_INFO,
  DEFAULT_TIMEOUT_MS,
  defaultTransportFactory,
  isClientErrorLike,
  LifetimeOwner,
  loadServersConfigFile,
  McpServerConfigSchema,
  normalizeSchema,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  PROBE_PROTOCOL_VERSION,
  probeStreamableHttp,
  selectTransport,
  validateServerConfig,
  WebSocketClientTransport,
} from "../../index.js";

describe("@toolmesh/mcp public API", () => {
  it("exports package metadata", () => {
    expect(PACKAGE_NAME).toBe("@toolmesh/mcp");
    expect(PACKAGE_VERSION).toBe("0.1.0");
    expect(DEFAULT_CLIENT_INFO).toEqual({ name: "toolmesh-mcp", version: "0.1.0" });
  });

  it("exports defaults", () => {
    expect(DEFAULT_TIMEOUT_MS).toBe(30_000);
    expect(PROBE_PROTOCOL_VERSION).toBe("2024-11-05");
  });

  it("exports the pipeline functions", () => {
    for (const fn of [
      convertMcpToTools,
      validateServerConfig,
      isClientErrorLike,
      probeStreamableHttp,
      selectTransport,
      normalizeSchema,
      loadServersConfigFile,
      createConsoleLogger,
    ]) {
      expect(typeof fn).toBe("function");
    }
  });

  it("exports classes and the default factory", () => {
    expect(typeof LifetimeOwner).toBe("function");
    expect(typeof WebSocketClientTransport).toBe("function");
    expect(Object.keys(defaultTransportFactory).sort()).toEqual([
      "sse",
      "stdio",
      "streamableHttp",
      "websocket",
    ]);
    expect(McpServerConfigSchema.safeParse({ command: "node" }).success).toBe(true);
  });
});
