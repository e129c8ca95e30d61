/**
 * @toolmesh/mcp
 *
 * Connect to MCP servers (local processes or remote endpoints), negotiate
 * the transport each one speaks, and expose their tools as plain callables.
 */

// ============================================================================
// ORCHESTRATION
// ============================================================================

export {
  type ConvertMcpToToolsOptions,
  convertMcpToTools,
  type McpToolsResult,
} from "./bridge/convert.js";
export { type ConnectServerOptions, connectServer, describeConfig } from "./bridge/connect-server.js";
export { type ClientInfo, type DiscoverToolsOptions, discoverTools } from "./bridge/discover-tools.js";
export { LifetimeOwner, type Teardown } from "./bridge/lifetime-owner.js";

// ============================================================================
// CONFIG
// ============================================================================

export {
  McpServerConfigSchema,
  McpServersFileSchema,
  parseServerConfig,
  parseServersConfig,
} from "./config/config.js";
export { loadServersConfigFile } from "./config/load.js";
export type {
  McpServerConfig,
  McpServerConfigInput,
  McpServersConfig,
  McpStdioServerConfig,
  McpUrlServerConfig,
  StdioErrlog,
  UrlScheme,
  ValidatedServerConfig,
} from "./config/types.js";
export {
  HTTP_TRANSPORTS,
  isSupportedScheme,
  resolveTransportName,
  SOCKET_TRANSPORTS,
  SUPPORTED_URL_SCHEMES,
  validateServerConfig,
} from "./config/validate.js";

// ============================================================================
// TRANSPORT
// ============================================================================

export { isClientErrorLike } from "./transport/classify-error.js";
export { createTransport, defaultTransportFactory } from "./transport/create-transport.js";
export {
  buildProbeRequest,
  type ProbeOptions,
  type ProbeRequest,
  probeStreamableHttp,
} from "./transport/probe.js";
export {
  buildChildEnv,
  type SelectTransportOptions,
  selectTransport,
} from "./transport/select-transport.js";
export type {
  ConnectedTransport,
  HttpTransportOptions,
  StdioLaunchParams,
  TransportFactory,
  TransportKind,
  TransportMeta,
  TransportSelection,
  WebSocketTransportOptions,
} from "./transport/types.js";
export {
  MCP_WS_SUBPROTOCOL,
  type WebSocketClientLike,
  WebSocketClientTransport,
  type WebSocketClientTransportOptions,
  type WsClientFactory,
  type WsConnectOptions,
} from "./transport/websocket-transport.js";

// ============================================================================
// TOOLS
// ============================================================================

export {
  createMcpTool,
  extractText,
  formatToolError,
  type McpTool,
  type McpToolOptions,
} from "./adapter/mcp-tool.js";
export { type JsonSchema, normalizeSchema } from "./adapter/schema.js";

// ============================================================================
// LOGGING
// ============================================================================

export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  createNoopLogger,
  isLogLevel,
  type LogLevel,
  type McpLogger,
  parseLogLevel,
} from "./logger.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export {
  DEFAULT_CLIENT_INFO,
  DEFAULT_TIMEOUT_MS,
  LOG_LEVEL_ENV,
  NO_TEXT_CONTENT,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  PROBE_CLIENT_INFO,
  PROBE_PROTOCOL_VERSION,
  STREAMABLE_HTTP_ACCEPT,
} from "./constants.js";
