/**
 * Runs the MCP handshake on an opened channel and wraps the server's tools.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  McpDiscoveryFailedError,
  McpInitializationFailedError,
  TimeoutError,
  getErrorMessage,
  toError,
} from "@toolmesh/errors";
import { type McpTool, createMcpTool } from "../adapter/mcp-tool.js";
import { DEFAULT_CLIENT_INFO } from "../constants.js";
import type { McpLogger } from "../logger.js";
import type { ConnectedTransport } from "../transport/types.js";
import type { LifetimeOwner } from "./lifetime-owner.js";

export interface ClientInfo {
  readonly name: string;
  readonly version: string;
}

export interface DiscoverToolsOptions {
  readonly logger: McpLogger;
  readonly clientInfo?: ClientInfo | undefined;
  readonly handleToolErrors?: boolean | undefined;
}

async function listAllTools(client: Client, timeoutMs: number | undefined): Promise<Tool[]> {
  const requestOptions = timeoutMs !== undefined ? { timeout: timeoutMs } : undefined;
  const tools: Tool[] = [];
  const seenCursors = new Set<string>();
  let cursor: string | undefined;

  do {
    const page = await client.listTools(cursor ? { cursor } : undefined, requestOptions);
    tools.push(...page.tools);
    cursor = page.nextCursor;
    if (cursor !== undefined) {
      if (seenCursors.has(cursor)) {
        throw new Error(`tools/list returned cursor "${cursor}" twice`);
      }
      seenCursors.add(cursor);
    }
  } while (cursor);

  return tools;
}

/**
 * Settle with `work`, or reject with a TimeoutError after `timeoutMs`.
 * `onExpire` is called when the deadline passes.
 */
async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number | undefined,
  message: string,
  onExpire: () => void,
): Promise<T> {
  if (timeoutMs === undefined) return work;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onExpire();
      reject(new TimeoutError(message, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Initialize a session on `connected`, register its close with `owner`,
 * and return the server's tools in server order.
 */
export async function discoverTools(
  connected: ConnectedTransport,
  owner: LifetimeOwner,
  options: DiscoverToolsOptions,
): Promise<McpTool[]> {
  const { serverName, requestTimeoutMs, connectTimeoutMs } = connected;
  const { logger } = options;
  const client = new Client({ ...(options.clientInfo ?? DEFAULT_CLIENT_INFO) }, { capabilities: {} });

  owner.defer(`session of MCP server "${serverName}"`, async () => {
    await connected.close();
    logger.info(`MCP server "${serverName}": session closed`);
  });

  try {
    // the SDK bounds the initialize request but not transport.start()
    await withDeadline(
      client.connect(
        connected.transport,
        requestTimeoutMs !== undefined ? { timeout: requestTimeoutMs } : undefined,
      ),
      connectTimeoutMs,
      `connecting timed out after ${connectTimeoutMs}ms`,
      () => {
        connected.close().catch((error: unknown) => {
          logger.warn(
            `MCP server "${serverName}": closing stalled transport failed: ${getErrorMessage(error)}`,
          );
        });
      },
    );
  } catch (error) {
    logger.error(`MCP server "${serverName}": initialization failed: ${getErrorMessage(error)}`);
    throw new McpInitializationFailedError(serverName, getErrorMessage(error), toError(error));
  }
  logger.info(`MCP server "${serverName}": session initialized`);

  if (!client.getServerCapabilities()?.tools) {
    logger.info(`MCP server "${serverName}": does not offer tools`);
    return [];
  }

  let tools: Tool[];
  try {
    tools = await listAllTools(client, requestTimeoutMs);
  } catch (error) {
    logger.error(`MCP server "${serverName}": tool discovery failed: ${getErrorMessage(error)}`);
    throw new McpDiscoveryFailedError(serverName, getErrorMessage(error), toError(error));
  }

  logger.info(`MCP server "${serverName}": ${tools.length} tool(s) available:`);
  for (const tool of tools) {
    logger.info(`- ${tool.name}`);
  }

  return tools.map((tool) =>
    createMcpTool(serverName, tool, client, {
      logger,
      timeoutMs: requestTimeoutMs,
      handleToolErrors: options.handleToolErrors,
    }),
  );
}
