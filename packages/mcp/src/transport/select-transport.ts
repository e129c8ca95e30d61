/**
 * Chooses the transport for a validated server entry.
 *
 *   command                         → stdio
 *   ws:// or wss://                 → websocket
 *   http(s) + streamable_http/http  → streamable_http
 *   http(s) + sse                   → sse (deprecated)
 *   http(s) + nothing / unknown     → probe, then streamable_http or sse
 */

import type { ValidatedServerConfig } from "../config/types.js";
import { SOCKET_TRANSPORTS } from "../config/validate.js";
import { DEFAULT_TIMEOUT_MS } from "../constants.js";
import type { McpLogger } from "../logger.js";
import { probeStreamableHttp } from "./probe.js";
import type { HttpTransportOptions, StdioLaunchParams, TransportSelection } from "./types.js";

export interface SelectTransportOptions {
  readonly logger: McpLogger;
}

/**
 * Child environment for a spawned server: the configured variables plus
 * the ambient PATH unless PATH was set explicitly.
 */
export function buildChildEnv(
  env: Readonly<Record<string, string>> = {},
  ambientPath: string | undefined = process.env.PATH,
): Record<string, string> {
  const childEnv: Record<string, string> = { ...env };
  if (!("PATH" in childEnv)) {
    childEnv.PATH = ambientPath ?? "";
  }
  return childEnv;
}

export async function selectTransport(
  serverName: string,
  validated: ValidatedServerConfig,
  options: SelectTransportOptions,
): Promise<TransportSelection> {
  const { logger } = options;
  const label = `MCP server "${serverName}"`;

  if (validated.kind === "command") {
    const { config } = validated;
    const params: StdioLaunchParams = {
      command: config.command,
      args: [...(config.args ?? [])],
      env: buildChildEnv(config.env),
      cwd: config.cwd,
      stderr: config.errlog,
    };
    logger.info(`${label}: spawning local process via stdio`);
    return { kind: "stdio", params };
  }

  const { config, url, scheme, transport } = validated;

  if (scheme === "ws" || scheme === "wss") {
    if (transport !== undefined && !SOCKET_TRANSPORTS.has(transport)) {
      logger.warn(
        `${label}: URL scheme "${scheme}" suggests WebSocket, but transport "${transport}" specified`,
      );
    }
    logger.info(`${label}: connecting via WebSocket`);
    return {
      kind: "websocket",
      url,
      options: { headers: config.headers, handshakeTimeoutMs: config.timeout ?? DEFAULT_TIMEOUT_MS },
    };
  }

  const httpOptions: HttpTransportOptions = {
    headers: config.headers,
    authProvider: config.authProvider,
  };

  if (transport === "streamable_http" || transport === "http") {
    logger.info(`${label}: connecting via Streamable HTTP`);
    return { kind: "streamable_http", url, options: httpOptions, detected: false };
  }

  if (transport === "sse") {
    logger.info(`${label}: connecting via SSE`);
    logger.warn(`${label}: SSE transport is deprecated, consider migrating to streamable_http`);
    return { kind: "sse", url, options: httpOptions, detected: false };
  }

  if (transport !== undefined) {
    logger.warn(`${label}: Unknown transport type "${transport}", auto-detecting`);
  }

  logger.info(`${label}: testing Streamable HTTP support`);
  const supported = await probeStreamableHttp(url, {
    headers: config.headers,
    timeoutMs: config.timeout ?? DEFAULT_TIMEOUT_MS,
    authProvider: config.authProvider,
    logger,
  });

  if (supported) {
    logger.info(`${label}: detected Streamable HTTP transport support`);
    return { kind: "streamable_http", url, options: httpOptions, detected: true };
  }

  logger.info(`${label}: received 4xx error, falling back to SSE transport`);
  logger.warn(`${label}: Using SSE transport (deprecated), server should support Streamable HTTP`);
  return { kind: "sse", url, options: httpOptions, detected: true };
}
