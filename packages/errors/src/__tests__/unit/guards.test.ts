import { describe, expect, it } from "vitest";
import {
  hasCode,
  InternalError,
  isError,
  isExpectedError,
  isExternalError,
  isInternalError,
  isTimeoutError,
  isToolmeshError,
  isValidationError,
  McpConfigurationError,
  McpProbeTimeoutError,
  McpTransportError,
} from "../../index.js";

describe("type guards", () => {
  const config = new McpConfigurationError("fs", "bad");
  const timeout = new McpProbeTimeoutError("https://remote.test/mcp", 10);
  const transport = new McpTransportError("closed");
  const internal = new InternalError("bug");

  it("discriminates base types", () => {
    expect(isValidationError(config)).toBe(true);
    expect(isTimeoutError(timeout)).toBe(true);
    expect(isExternalError(transport)).toBe(true);
    expect(isInternalError(internal)).toBe(true);

    expect(isValidationError(transport)).toBe(false);
    expect(isExternalError(timeout)).toBe(false);
  });

  it("recognizes toolmesh errors and plain errors", () => {
    expect(isToolmeshError(config)).toBe(true);
    expect(isToolmeshError(new Error("x"))).toBe(false);
    expect(isError(new Error("x"))).toBe(true);
    expect(isError("x")).toBe(false);
  });

  it("matches codes", () => {
    expect(hasCode(transport, "MCP_TRANSPORT_ERROR")).toBe(true);
    expect(hasCode(transport, "MCP_HTTP_STATUS")).toBe(false);
  });

  it("reports expected errors", () => {
    expect(isExpectedError(config)).toBe(true);
    expect(isExpectedError(transport)).toBe(false);
    expect(isExpectedError(new Error("x"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });
});
