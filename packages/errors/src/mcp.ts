/**
 * MCP errors: server configuration, transport negotiation, discovery and
 * tool invocation.
 *
 *   - McpConfigurationError        (MCP_CONFIG_INVALID)         ValidationError
 *   - McpConnectionFailedError     (MCP_CONNECTION_FAILED)      ExternalError
 *   - McpInitializationFailedError (MCP_INITIALIZATION_FAILED)  ExternalError
 *   - McpDiscoveryFailedError      (MCP_TOOL_DISCOVERY_FAILED)  ExternalError
 *   - McpHttpStatusError           (MCP_HTTP_STATUS)            ExternalError
 *   - McpProbeTimeoutError         (MCP_PROBE_TIMEOUT)          TimeoutError
 *   - McpTransportError            (MCP_TRANSPORT_ERROR)        ExternalError
 *   - McpToolCallFailedError       (MCP_TOOL_CALL_FAILED)       ExternalError
 */

import { ExternalError } from "./bases/external-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * A server entry that is structurally invalid or contradicts itself.
 * Raised before any process or network activity.
 */
export class McpConfigurationError extends ValidationError<"MCP_CONFIG_INVALID"> {
  constructor(
    public readonly serverName: string,
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_CONFIG_INVALID",
      message: `MCP server "${serverName}": ${message}`,
      issues,
      metadata,
    });
  }
}

export class McpConnectionFailedError extends ExternalError<"MCP_CONNECTION_FAILED"> {
  constructor(
    public readonly serverName: string,
    message: string,
    public override readonly cause?: Error,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_CONNECTION_FAILED",
      message: `MCP server "${serverName}": connection failed: ${message}`,
      metadata,
      ...(cause ? { cause } : {}),
    });
  }
}

export class McpInitializationFailedError extends ExternalError<"MCP_INITIALIZATION_FAILED"> {
  constructor(
    public readonly serverName: string,
    message: string,
    public override readonly cause?: Error,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_INITIALIZATION_FAILED",
      message: `MCP server "${serverName}": initialization failed: ${message}`,
      metadata,
      ...(cause ? { cause } : {}),
    });
  }
}

export class McpDiscoveryFailedError extends ExternalError<"MCP_TOOL_DISCOVERY_FAILED"> {
  constructor(
    public readonly serverName: string,
    message: string,
    public override readonly cause?: Error,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_TOOL_DISCOVERY_FAILED",
      message: `MCP server "${serverName}": tool discovery failed: ${message}`,
      metadata,
      ...(cause ? { cause } : {}),
    });
  }
}

/**
 * Non-success, non-4xx answer from an HTTP endpoint.
 * `status` carries the raw HTTP status so callers can classify it.
 */
export class McpHttpStatusError extends ExternalError<"MCP_HTTP_STATUS"> {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string = "",
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_HTTP_STATUS",
      message: `HTTP ${status}${statusText ? ` ${statusText}` : ""} from ${url}`,
      metadata,
    });
  }
}

export class McpProbeTimeoutError extends TimeoutError<"MCP_PROBE_TIMEOUT"> {
  constructor(
    public readonly url: string,
    timeoutMs: number,
  ) {
    super({
      code: "MCP_PROBE_TIMEOUT",
      message: `Streamable HTTP probe of ${url} timed out after ${timeoutMs}ms`,
      timeoutMs,
    });
  }
}

export class McpTransportError extends ExternalError<"MCP_TRANSPORT_ERROR"> {
  constructor(
    message: string,
    public override readonly cause?: Error,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "MCP_TRANSPORT_ERROR",
      message: `MCP transport error: ${message}`,
      metadata,
      ...(cause ? { cause } : {}),
    });
  }
}

export class McpToolCallFailedError extends ExternalError<"MCP_TOOL_CALL_FAILED"> {
  constructor(
    public readonly serverName: string,
    public readonly toolName: string,
    message: string,
    public override readonly cause?: Error,
  ) {
    super({
      code: "MCP_TOOL_CALL_FAILED",
      message: `MCP tool "${serverName}"/"${toolName}" call failed: ${message}`,
      ...(cause ? { cause } : {}),
    });
  }
}
