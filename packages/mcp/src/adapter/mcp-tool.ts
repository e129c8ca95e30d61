/**
 * Wraps one discovered MCP tool as a callable with a string result.
 */

import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { McpToolCallFailedError, getErrorMessage, toError } from "@toolmesh/errors";
import { NO_TEXT_CONTENT } from "../constants.js";
import type { McpLogger } from "../logger.js";
import { type JsonSchema, normalizeSchema } from "./schema.js";

export interface McpTool {
  readonly name: string;
  /** Empty when the server gives none */
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly serverName: string;
  invoke(args?: Readonly<Record<string, unknown>>): Promise<string>;
}

export interface McpToolOptions {
  readonly logger: McpLogger;
  /** Per-call timeout in ms; undefined leaves the SDK default */
  readonly timeoutMs?: number | undefined;
  /** Return failures as an error string instead of throwing */
  readonly handleToolErrors?: boolean | undefined;
}

interface TextContent {
  readonly type: "text";
  readonly text: string;
}

function isTextContent(item: unknown): item is TextContent {
  return (
    typeof item === "object" &&
    item !== null &&
    "type" in item &&
    item.type === "text" &&
    "text" in item &&
    typeof item.text === "string"
  );
}

/**
 * Text parts of a tool result, joined by blank lines.
 */
export function extractText(content: unknown): string {
  const items: unknown[] = Array.isArray(content) ? content : [];
  return items
    .filter(isTextContent)
    .map((item) => item.text)
    .join("\n\n");
}

export function formatToolError(error: unknown): string {
  return `Error executing MCP tool: ${getErrorMessage(error)}`;
}

export function createMcpTool(
  serverName: string,
  tool: Tool,
  client: Client,
  options: McpToolOptions,
): McpTool {
  const { logger, timeoutMs, handleToolErrors = false } = options;
  const label = `MCP tool "${serverName}"/"${tool.name}"`;

  const invoke = async (args: Readonly<Record<string, unknown>> = {}): Promise<string> => {
    logger.info(`${label} received input: ${JSON.stringify(args)}`);
    try {
      const result = await client.callTool(
        { name: tool.name, arguments: { ...args } },
        undefined,
        timeoutMs !== undefined ? { timeout: timeoutMs } : undefined,
      );
      const text = extractText(result.content);

      if (result.isError === true) {
        throw new McpToolCallFailedError(serverName, tool.name, text || "tool reported an error");
      }

      logger.info(`${label} received result (size: ${Buffer.byteLength(text, "utf8")})`);
      return text || NO_TEXT_CONTENT;
    } catch (error) {
      logger.warn(`${label} caused error: ${getErrorMessage(error)}`);
      if (handleToolErrors) return formatToolError(error);
      if (error instanceof McpToolCallFailedError) throw error;
      throw new McpToolCallFailedError(serverName, tool.name, getErrorMessage(error), toError(error));
    }
  };

  return Object.freeze({
    name: tool.name,
    description: tool.description ?? "",
    inputSchema: Object.freeze(normalizeSchema(tool.inputSchema)),
    serverName,
    invoke,
  });
}
