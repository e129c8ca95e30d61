/**
 * Opens the channel to one server: validate, select, build the transport,
 * register its release with the lifetime owner.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  McpConfigurationError,
  McpConnectionFailedError,
  getErrorMessage,
  toError,
} from "@toolmesh/errors";
import type { McpServerConfigInput } from "../config/types.js";
import { validateServerConfig } from "../config/validate.js";
import { DEFAULT_TIMEOUT_MS } from "../constants.js";
import type { McpLogger } from "../logger.js";
import { createTransport, defaultTransportFactory } from "../transport/create-transport.js";
import { selectTransport } from "../transport/select-transport.js";
import type {
  ConnectedTransport,
  TransportFactory,
  TransportKind,
  TransportMeta,
  TransportSelection,
} from "../transport/types.js";
import type { LifetimeOwner } from "./lifetime-owner.js";

export interface ConnectServerOptions {
  readonly logger: McpLogger;
  readonly transportFactory?: TransportFactory | undefined;
}

interface SessionTerminator {
  terminateSession(): Promise<void>;
}

function canTerminateSession(transport: Transport): transport is Transport & SessionTerminator {
  return "terminateSession" in transport && typeof transport.terminateSession === "function";
}

/**
 * ConnectedTransport whose close runs at most once, however many owners
 * (transport teardown, session teardown) ask for it.
 */
class ManagedTransport implements ConnectedTransport {
  private closing: Promise<void> | undefined;

  constructor(
    readonly serverName: string,
    readonly kind: TransportKind,
    readonly transport: Transport,
    readonly requestTimeoutMs: number | undefined,
    readonly connectTimeoutMs: number | undefined,
    private readonly terminateOnClose: boolean,
    private readonly logger: McpLogger,
  ) {}

  get meta(): TransportMeta | undefined {
    const { sessionId } = this.transport;
    return sessionId ? { sessionId } : undefined;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  close(): Promise<void> {
    this.closing ??= this.release();
    return this.closing;
  }

  private async release(): Promise<void> {
    if (this.kind === "streamable_http" && this.terminateOnClose && this.meta) {
      const { transport } = this;
      if (canTerminateSession(transport)) {
        try {
          await transport.terminateSession();
        } catch (error) {
          this.logger.warn(
            `MCP server "${this.serverName}": session termination failed: ${getErrorMessage(error)}`,
          );
        }
      }
    }
    await this.transport.close();
    this.logger.debug(`MCP server "${this.serverName}": transport closed`);
  }
}

function requestTimeoutFor(
  selection: TransportSelection,
  config: McpServerConfigInput,
): number | undefined {
  switch (selection.kind) {
    case "stdio":
      return undefined;
    case "sse":
      return config.sseReadTimeout ?? config.timeout ?? DEFAULT_TIMEOUT_MS;
    default:
      return config.timeout ?? DEFAULT_TIMEOUT_MS;
  }
}

/**
 * Connect to one server and register the channel's release with `owner`.
 *
 * Configuration problems surface as McpConfigurationError before any I/O;
 * everything else is wrapped in McpConnectionFailedError.
 */
export async function connectServer(
  serverName: string,
  config: McpServerConfigInput,
  owner: LifetimeOwner,
  options: ConnectServerOptions,
): Promise<ConnectedTransport> {
  const { logger } = options;
  const factory = options.transportFactory ?? defaultTransportFactory;

  logger.info(`MCP server "${serverName}": initializing with: ${describeConfig(config)}`);
  const validated = validateServerConfig(serverName, config, logger);

  let selection: TransportSelection;
  let transport: Transport;
  try {
    selection = await selectTransport(serverName, validated, { logger });
    transport = await createTransport(selection, factory);
  } catch (error) {
    if (error instanceof McpConfigurationError) throw error;
    logger.error(`MCP server "${serverName}": connection failed: ${getErrorMessage(error)}`);
    throw new McpConnectionFailedError(serverName, getErrorMessage(error), toError(error));
  }

  const connected = new ManagedTransport(
    serverName,
    selection.kind,
    transport,
    requestTimeoutFor(selection, config),
    selection.kind === "stdio" ? undefined : (config.timeout ?? DEFAULT_TIMEOUT_MS),
    config.terminateOnClose ?? true,
    logger,
  );
  owner.defer(`transport of MCP server "${serverName}"`, () => connected.close());
  logger.info(`MCP server "${serverName}": ${selection.kind} transport ready`);
  return connected;
}

const REDACTED = "***";

function maskUrl(url: string | undefined): string | undefined {
  if (url === undefined) return undefined;
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!parsed.username && !parsed.password && !parsed.search) return url;

  if (parsed.username) parsed.username = REDACTED;
  if (parsed.password) parsed.password = REDACTED;
  for (const key of new Set(parsed.searchParams.keys())) {
    parsed.searchParams.set(key, REDACTED);
  }
  return parsed.toString();
}

/**
 * Loggable summary of a server entry. Header and env values, URL
 * credentials and query values are masked.
 */
export function describeConfig(config: McpServerConfigInput): string {
  const mask = (values: Readonly<Record<string, string>> | undefined) =>
    values ? Object.fromEntries(Object.keys(values).map((key) => [key, REDACTED])) : undefined;

  return JSON.stringify({
    command: config.command,
    args: config.args,
    env: mask(config.env),
    cwd: config.cwd,
    url: maskUrl(config.url),
    transport: config.transport ?? config.type,
    headers: mask(config.headers),
    timeout: config.timeout,
  });
}
