/**
 * Transport selection and construction types.
 */

import type { OAuthClientProvider } from "@modelcontextprotocol/sdk/client/auth.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { StdioErrlog } from "../config/types.js";

export type TransportKind = "stdio" | "streamable_http" | "sse" | "websocket";

/** Resolved launch parameters for a local server process */
export interface StdioLaunchParams {
  readonly command: string;
  readonly args: readonly string[];
  /** Full child environment; PATH already injected */
  readonly env: Readonly<Record<string, string>>;
  readonly cwd?: string | undefined;
  readonly stderr?: StdioErrlog | undefined;
}

export interface HttpTransportOptions {
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly authProvider?: OAuthClientProvider | undefined;
}

export interface WebSocketTransportOptions {
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Upper bound on the opening handshake */
  readonly handshakeTimeoutMs?: number | undefined;
}

/**
 * Outcome of transport selection, one variant per transport kind.
 * `detected` is true when the choice came from probing rather than config.
 */
export type TransportSelection =
  | { readonly kind: "stdio"; readonly params: StdioLaunchParams }
  | {
      readonly kind: "streamable_http";
      readonly url: URL;
      readonly options: HttpTransportOptions;
      readonly detected: boolean;
    }
  | {
      readonly kind: "sse";
      readonly url: URL;
      readonly options: HttpTransportOptions;
      readonly detected: boolean;
    }
  | { readonly kind: "websocket"; readonly url: URL; readonly options: WebSocketTransportOptions };

/**
 * Builds SDK transports. Injected into the connector so tests can hand
 * back in-memory transports.
 */
export interface TransportFactory {
  stdio(params: StdioLaunchParams): Promise<Transport>;
  streamableHttp(url: URL, options: HttpTransportOptions): Promise<Transport>;
  sse(url: URL, options: HttpTransportOptions): Promise<Transport>;
  websocket(url: URL, options: WebSocketTransportOptions): Promise<Transport>;
}

export interface TransportMeta {
  /** Streamable HTTP session id, once the server has assigned one */
  readonly sessionId: string;
}

/**
 * An opened (not yet initialized) channel to one server.
 */
export interface ConnectedTransport {
  readonly serverName: string;
  readonly kind: TransportKind;
  readonly transport: Transport;
  readonly meta: TransportMeta | undefined;
  /** Timeout for MCP requests over this channel; undefined means the SDK default */
  readonly requestTimeoutMs: number | undefined;
  /** Deadline for starting the channel and completing `initialize`; undefined for stdio */
  readonly connectTimeoutMs: number | undefined;
  readonly closed: boolean;
  /** Close the channel. Safe to call more than once. */
  close(): Promise<void>;
}
