/**
 * Server configuration types.
 *
 * `McpServerConfigInput` is the loose shape accepted at the edges (object
 * literals, parsed JSON). Validation narrows it to one of the two variants.
 */

import type { IOType } from "node:child_process";
import type { Stream } from "node:stream";
import type { OAuthClientProvider } from "@modelcontextprotocol/sdk/client/auth.js";

/** Where a spawned server's stderr goes */
export type StdioErrlog = IOType | Stream | number;

export interface McpServerConfigInput {
  readonly command?: string | undefined;
  readonly args?: readonly string[] | undefined;
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly cwd?: string | undefined;
  readonly errlog?: StdioErrlog | undefined;
  readonly url?: string | undefined;
  /** Transport name; takes precedence over `type` */
  readonly transport?: string | undefined;
  /** Editor-style alias for `transport` */
  readonly type?: string | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Milliseconds; probe and MCP request timeout for URL servers */
  readonly timeout?: number | undefined;
  readonly authProvider?: OAuthClientProvider | undefined;
  /** Milliseconds; MCP request timeout over the legacy SSE stream */
  readonly sseReadTimeout?: number | undefined;
  /** Send the Streamable HTTP session termination request on close (default true) */
  readonly terminateOnClose?: boolean | undefined;
}

export interface McpStdioServerConfig extends McpServerConfigInput {
  readonly command: string;
  readonly url?: undefined;
}

export interface McpUrlServerConfig extends McpServerConfigInput {
  readonly url: string;
  readonly command?: undefined;
}

export type McpServerConfig = McpStdioServerConfig | McpUrlServerConfig;

/** Server name → configuration, in connection order */
export type McpServersConfig = Readonly<Record<string, McpServerConfigInput>>;

export type UrlScheme = "http" | "https" | "ws" | "wss";

/**
 * Result of a successful validation. `transport` is the lowercased
 * transport name (from `transport`, else `type`), or undefined.
 */
export type ValidatedServerConfig =
  | {
      readonly kind: "command";
      readonly config: McpStdioServerConfig;
      readonly transport: string | undefined;
    }
  | {
      readonly kind: "url";
      readonly config: McpUrlServerConfig;
      readonly transport: string | undefined;
      readonly url: URL;
      readonly scheme: UrlScheme;
    };
