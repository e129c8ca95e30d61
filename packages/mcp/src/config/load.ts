import { readFile } from "node:fs/promises";
import { ValidationError, getErrorMessage } from "@toolmesh/errors";
import { parseServersConfig } from "./config.js";
import type { McpServersConfig } from "./types.js";

/**
 * Read a JSON servers file (bare mapping or `{ "mcpServers": {...} }`).
 *
 * Throws ValidationError when the file cannot be read or is not JSON, and
 * McpConfigurationError for a malformed entry.
 */
export async function loadServersConfigFile(filePath: string): Promise<McpServersConfig> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ValidationError(
      `Cannot read MCP servers config "${filePath}": ${getErrorMessage(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `MCP servers config "${filePath}" is not valid JSON: ${getErrorMessage(error)}`,
    );
  }

  return parseServersConfig(raw);
}
