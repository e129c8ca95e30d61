/**
 * Entry point: turn a mapping of MCP server configs into callable tools.
 */

import { getErrorMessage } from "@toolmesh/errors";
import type { McpTool } from "../adapter/mcp-tool.js";
import type { McpServersConfig } from "../config/types.js";
import { LOG_LEVEL_ENV } from "../constants.js";
import {
  type LogLevel,
  type McpLogger,
  createConsoleLogger,
  parseLogLevel,
} from "../logger.js";
import type { ConnectedTransport, TransportFactory } from "../transport/types.js";
import { connectServer } from "./connect-server.js";
import { type ClientInfo, discoverTools } from "./discover-tools.js";
import { LifetimeOwner } from "./lifetime-owner.js";

export interface ConvertMcpToToolsOptions {
  /** Defaults to a console logger at `logLevel` */
  readonly logger?: McpLogger | undefined;
  /** Level of the default logger; falls back to TOOLMESH_LOG_LEVEL, then "info" */
  readonly logLevel?: LogLevel | undefined;
  readonly transportFactory?: TransportFactory | undefined;
  readonly clientInfo?: ClientInfo | undefined;
  /** Tools return "Error executing MCP tool: ..." instead of throwing */
  readonly handleToolErrors?: boolean | undefined;
}

export interface McpToolsResult {
  readonly tools: readonly McpTool[];
  /** Closes every session and transport, last opened first. Idempotent. */
  readonly cleanup: () => Promise<void>;
}

/**
 * Connect to every configured server in mapping order, initialize each
 * session, and collect all tools.
 *
 * On any failure the resources opened so far are released before the
 * error is rethrown.
 */
export async function convertMcpToTools(
  configs: McpServersConfig,
  options: ConvertMcpToToolsOptions = {},
): Promise<McpToolsResult> {
  const logger =
    options.logger ??
    createConsoleLogger({
      level: options.logLevel ?? parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? "info",
    });
  const owner = new LifetimeOwner(logger);
  const serverNames = Object.keys(configs);

  logger.info(`Initializing ${serverNames.length} MCP server(s)`);

  try {
    const connections: ConnectedTransport[] = [];
    for (const [serverName, config] of Object.entries(configs)) {
      connections.push(
        await connectServer(serverName, config, owner, {
          logger,
          transportFactory: options.transportFactory,
        }),
      );
    }

    const tools: McpTool[] = [];
    for (const connection of connections) {
      const serverTools = await discoverTools(connection, owner, {
        logger,
        clientInfo: options.clientInfo,
        handleToolErrors: options.handleToolErrors,
      });
      tools.push(...serverTools);
    }

    logger.info(`MCP servers initialized: ${tools.length} tool(s) available in total`);
    return Object.freeze({
      tools: Object.freeze(tools),
      cleanup: () => owner.close(),
    });
  } catch (error) {
    try {
      await owner.close();
    } catch (closeError) {
      logger.error(`Cleanup after failed initialization also failed: ${getErrorMessage(closeError)}`);
    }
    throw error;
  }
}
