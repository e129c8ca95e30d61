/**
 * Zod schemas for server entries read from untyped sources (JSON files,
 * environment). Field types only; cross-field rules live in validate.ts.
 */

import { McpConfigurationError, ValidationError, type ValidationIssue } from "@toolmesh/errors";
import { type ZodIssue, z } from "zod";
import type { McpServerConfigInput, McpServersConfig } from "./types.js";

export const McpServerConfigSchema = z
  .object({
    command: z.string().optional(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    errlog: z
      .union([
        z.enum(["inherit", "pipe", "ignore", "overlapped"]),
        z.number().int().nonnegative(),
      ])
      .optional(),
    url: z.string().optional(),
    transport: z.string().optional(),
    type: z.string().optional(),
    headers: z.record(z.string()).optional(),
    timeout: z.number().positive().optional(),
    sseReadTimeout: z.number().positive().optional(),
    terminateOnClose: z.boolean().optional(),
  })
  .strict();

/**
 * A servers file is either the bare name → entry mapping, or that mapping
 * under an `mcpServers` key.
 */
const McpServersMappingSchema = z.record(z.unknown());

export const McpServersFileSchema = z.union([
  z.object({ mcpServers: McpServersMappingSchema }).transform((file) => file.mcpServers),
  McpServersMappingSchema,
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function serverMappingOf(raw: Record<string, unknown>): Record<string, unknown> {
  const wrapped = raw.mcpServers;
  return isRecord(wrapped) ? wrapped : raw;
}

function toIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Check the field types of one raw entry.
 * Throws McpConfigurationError carrying one issue per bad field.
 */
export function parseServerConfig(serverName: string, raw: unknown): McpServerConfigInput {
  const result = McpServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = toIssues(result.error.issues);
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    throw new McpConfigurationError(serverName, `Invalid configuration: ${summary}`, issues);
  }
  return result.data;
}

/**
 * Check a whole servers mapping, bare or wrapped in `mcpServers`.
 * Entry order is preserved.
 */
export function parseServersConfig(raw: unknown): McpServersConfig {
  const result = McpServersFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      "MCP servers config must be an object mapping server names to configurations",
      toIssues(result.error.issues),
    );
  }

  // zod skips a "__proto__" key, so entries come from the input itself
  const mapping = isRecord(raw) ? serverMappingOf(raw) : result.data;
  return Object.fromEntries(
    Object.entries(mapping).map(([serverName, entry]) => [
      serverName,
      parseServerConfig(serverName, entry),
    ]),
  );
}
