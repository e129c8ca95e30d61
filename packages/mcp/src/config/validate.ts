/**
 * Semantic validation of a single server entry. No I/O.
 */

import { McpConfigurationError } from "@toolmesh/errors";
import type { McpLogger } from "../logger.js";
import type {
  McpServerConfigInput,
  McpStdioServerConfig,
  McpUrlServerConfig,
  UrlScheme,
  ValidatedServerConfig,
} from "./types.js";

export const SUPPORTED_URL_SCHEMES: readonly UrlScheme[] = ["http", "https", "ws", "wss"];

/** Transport names that require an http(s) URL */
export const HTTP_TRANSPORTS: ReadonlySet<string> = new Set(["streamable_http", "http", "sse"]);

/** Transport names that require a ws(s) URL */
export const SOCKET_TRANSPORTS: ReadonlySet<string> = new Set(["websocket", "ws"]);

const SUPPORTED_SCHEME_SET: ReadonlySet<string> = new Set(SUPPORTED_URL_SCHEMES);

export function isSupportedScheme(scheme: string): scheme is UrlScheme {
  return SUPPORTED_SCHEME_SET.has(scheme);
}

/**
 * Lowercased transport name: `transport` wins over `type`, blank means none.
 */
export function resolveTransportName(config: McpServerConfigInput): string | undefined {
  const name = (config.transport || config.type)?.trim().toLowerCase();
  return name ? name : undefined;
}

/**
 * Validate one server entry and narrow it to its command or URL variant.
 *
 * Throws McpConfigurationError on the first violated rule. An unknown
 * transport name on a command entry only produces a warning.
 */
export function validateServerConfig(
  serverName: string,
  config: McpServerConfigInput,
  logger: McpLogger,
): ValidatedServerConfig {
  const { url, command } = config;

  if (url != null && command != null) {
    throw new McpConfigurationError(
      serverName,
      `Cannot specify both "url" (${url}) and "command" (${command}). ` +
        'Use "url" for remote servers or "command" for local servers.',
    );
  }

  const transport = resolveTransportName(config);

  if (url != null) {
    const { command: _command, ...rest } = config;
    return validateUrlConfig(serverName, { ...rest, url }, transport);
  }

  if (command != null) {
    const { url: _url, ...rest } = config;
    return validateCommandConfig(serverName, { ...rest, command }, transport, logger);
  }

  throw new McpConfigurationError(serverName, 'Either "url" or "command" must be specified');
}

function validateUrlConfig(
  serverName: string,
  config: McpUrlServerConfig,
  transport: string | undefined,
): ValidatedServerConfig {
  let parsed: URL;
  try {
    parsed = new URL(config.url);
  } catch {
    throw new McpConfigurationError(serverName, `Invalid URL format: ${config.url}`);
  }

  // URL.protocol always ends with ":"
  const scheme = parsed.protocol.slice(0, -1).toLowerCase();

  if (transport !== undefined) {
    if (HTTP_TRANSPORTS.has(transport) && scheme !== "http" && scheme !== "https") {
      throw new McpConfigurationError(
        serverName,
        `Transport "${transport}" requires http:// or https:// URL, but got: ${scheme}://`,
      );
    }
    if (SOCKET_TRANSPORTS.has(transport) && scheme !== "ws" && scheme !== "wss") {
      throw new McpConfigurationError(
        serverName,
        `Transport "${transport}" requires ws:// or wss:// URL, but got: ${scheme}://`,
      );
    }
    if (transport === "stdio") {
      throw new McpConfigurationError(
        serverName,
        'Transport "stdio" requires "command", but "url" was provided',
      );
    }
  }

  if (!isSupportedScheme(scheme)) {
    throw new McpConfigurationError(
      serverName,
      `Unsupported URL scheme "${scheme}". Supported schemes: ${SUPPORTED_URL_SCHEMES.join(", ")}`,
    );
  }

  return { kind: "url", config, transport, url: parsed, scheme };
}

function validateCommandConfig(
  serverName: string,
  config: McpStdioServerConfig,
  transport: string | undefined,
  logger: McpLogger,
): ValidatedServerConfig {
  if (config.command.trim() === "") {
    throw new McpConfigurationError(serverName, '"command" must not be empty');
  }

  if (transport !== undefined && transport !== "stdio") {
    if (HTTP_TRANSPORTS.has(transport) || SOCKET_TRANSPORTS.has(transport)) {
      throw new McpConfigurationError(
        serverName,
        `Transport "${transport}" requires "url", but "command" was provided`,
      );
    }
    logger.warn(`MCP server "${serverName}": Unknown transport type "${transport}", treating as stdio`);
  }

  return { kind: "command", config, transport };
}
