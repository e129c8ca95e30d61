/**
 * Default TransportFactory backed by the MCP SDK client transports.
 * Uses lazy imports to avoid pulling in unused transport modules.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { McpTransportError } from "@toolmesh/errors";
import type {
  HttpTransportOptions,
  StdioLaunchParams,
  TransportFactory,
  TransportSelection,
  WebSocketTransportOptions,
} from "./types.js";

function requestInitFor(options: HttpTransportOptions): RequestInit | undefined {
  return options.headers ? { headers: { ...options.headers } } : undefined;
}

export const defaultTransportFactory: TransportFactory = {
  async stdio(params: StdioLaunchParams): Promise<Transport> {
    const { StdioClientTransport } = await import("@modelcontextprotocol/sdk/client/stdio.js");
    return new StdioClientTransport({
      command: params.command,
      args: [...params.args],
      env: { ...params.env },
      cwd: params.cwd,
      stderr: params.stderr,
    });
  },

  async streamableHttp(url: URL, options: HttpTransportOptions): Promise<Transport> {
    const { StreamableHTTPClientTransport } = await import(
      "@modelcontextprotocol/sdk/client/streamableHttp.js"
    );
    return new StreamableHTTPClientTransport(url, {
      requestInit: requestInitFor(options),
      authProvider: options.authProvider,
    });
  },

  async sse(url: URL, options: HttpTransportOptions): Promise<Transport> {
    const { SSEClientTransport } = await import("@modelcontextprotocol/sdk/client/sse.js");
    return new SSEClientTransport(url, {
      requestInit: requestInitFor(options),
      authProvider: options.authProvider,
    });
  },

  async websocket(url: URL, options: WebSocketTransportOptions): Promise<Transport> {
    const { WebSocketClientTransport } = await import("./websocket-transport.js");
    return new WebSocketClientTransport(url, {
      headers: options.headers,
      handshakeTimeoutMs: options.handshakeTimeoutMs,
    });
  },
};

/**
 * Build the transport a selection calls for.
 */
export async function createTransport(
  selection: TransportSelection,
  factory: TransportFactory = defaultTransportFactory,
): Promise<Transport> {
  switch (selection.kind) {
    case "stdio":
      return factory.stdio(selection.params);
    case "streamable_http":
      return factory.streamableHttp(selection.url, selection.options);
    case "sse":
      return factory.sse(selection.url, selection.options);
    case "websocket":
      return factory.websocket(selection.url, selection.options);
    default: {
      const unreachable: never = selection;
      throw new McpTransportError(`Unknown transport selection: ${JSON.stringify(unreachable)}`);
    }
  }
}
