/**
 * Defaults shared by the probe, the connector and the discovery step.
 */

export const PACKAGE_NAME = "@toolmesh/mcp";
export const PACKAGE_VERSION = "0.1.0";

/** Default per-server timeout for URL-based servers (probe and MCP requests) */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Protocol version sent by the Streamable HTTP detection request */
export const PROBE_PROTOCOL_VERSION = "2024-11-05";

/** Client identity sent by the Streamable HTTP detection request */
export const PROBE_CLIENT_INFO = Object.freeze({
  name: "mcp-transport-test",
  version: "1.0.0",
});

/** Accept header value every Streamable HTTP POST must carry */
export const STREAMABLE_HTTP_ACCEPT = "application/json, text/event-stream";

/** Client identity used for real sessions */
export const DEFAULT_CLIENT_INFO = Object.freeze({
  name: "toolmesh-mcp",
  version: PACKAGE_VERSION,
});

/** Returned by a tool invocation whose result carries no text content */
export const NO_TEXT_CONTENT = "No text content available in response";

/** Environment variable consulted for the default logger's level */
export const LOG_LEVEL_ENV = "TOOLMESH_LOG_LEVEL";
