import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { type JSONRPCMessage, JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { McpTransportError, toError } from "@toolmesh/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WebSocketClientLike {
  send(data: string, callback?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
  readonly readyState: number;
}

export interface WsConnectOptions {
  readonly headers: Record<string, string>;
  readonly handshakeTimeout?: number;
}

/**
 * Factory for WebSocket client instances. Injectable for testing.
 */
export type WsClientFactory = (
  url: string,
  protocols: string[],
  options: WsConnectOptions,
) => WebSocketClientLike | Promise<WebSocketClientLike>;

export interface WebSocketClientTransportOptions {
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly factory?: WsClientFactory | undefined;
  /** Reject start() if the socket has not opened within this many ms */
  readonly handshakeTimeoutMs?: number | undefined;
}

/** Subprotocol MCP servers expect on the upgrade request */
export const MCP_WS_SUBPROTOCOL = "mcp";

const WS_CONNECTING = 0;
const WS_OPEN = 1;

async function createDefaultWs(
  url: string,
  protocols: string[],
  options: WsConnectOptions,
): Promise<WebSocketClientLike> {
  const { default: WebSocket } = await import("ws");
  return new WebSocket(url, protocols, {
    headers: options.headers,
    handshakeTimeout: options.handshakeTimeout,
  });
}

function rawDataToString(data: unknown): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk))).toString(
      "utf8",
    );
  }
  return String(data);
}

// ---------------------------------------------------------------------------
// WebSocketClientTransport
// ---------------------------------------------------------------------------

/**
 * MCP client transport over a WebSocket: one JSON-RPC message per text
 * frame, `mcp` subprotocol, configured headers on the upgrade request.
 */
export class WebSocketClientTransport implements Transport {
  private ws: WebSocketClientLike | undefined;
  private started = false;

  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  constructor(
    private readonly url: URL,
    private readonly options: WebSocketClientTransportOptions = {},
  ) {}

  async start(): Promise<void> {
    if (this.started) {
      throw new McpTransportError("WebSocket transport already started");
    }
    this.started = true;

    const factory = this.options.factory ?? createDefaultWs;
    const target = this.url.toString();
    const { handshakeTimeoutMs } = this.options;
    const ws = await factory(target, [MCP_WS_SUBPROTOCOL], {
      headers: { ...this.options.headers },
      ...(handshakeTimeoutMs !== undefined ? { handshakeTimeout: handshakeTimeoutMs } : {}),
    });
    this.ws = ws;

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        fn();
      };

      if (handshakeTimeoutMs !== undefined) {
        timer = setTimeout(() => {
          settle(() => {
            this.ws = undefined;
            ws.close();
            reject(
              new McpTransportError(
                `WebSocket handshake with ${target} timed out after ${handshakeTimeoutMs}ms`,
              ),
            );
          });
        }, handshakeTimeoutMs);
      }

      ws.on("open", () => {
        settle(() => {
          this.wireEventHandlers(ws);
          resolve();
        });
      });

      ws.on("error", (err: unknown) => {
        settle(() => {
          reject(
            new McpTransportError(`WebSocket connection to ${target} failed`, toError(err)),
          );
        });
      });

      ws.on("close", (code: unknown) => {
        settle(() => {
          reject(
            new McpTransportError(
              `WebSocket to ${target} closed during connect: code=${String(code)}`,
            ),
          );
        });
      });
    });
  }

  async send(message: JSONRPCMessage): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WS_OPEN) {
      throw new McpTransportError("WebSocket is not connected");
    }
    await new Promise<void>((resolve, reject) => {
      ws.send(JSON.stringify(message), (error) => {
        if (error) reject(new McpTransportError("WebSocket send failed", error));
        else resolve();
      });
    });
  }

  async close(): Promise<void> {
    const ws = this.ws;
    this.ws = undefined;
    if (ws && (ws.readyState === WS_OPEN || ws.readyState === WS_CONNECTING)) {
      ws.close(1000, "Client closed");
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private wireEventHandlers(ws: WebSocketClientLike): void {
    ws.on("message", (data: unknown) => {
      this.handleRawMessage(rawDataToString(data));
    });

    ws.on("close", () => {
      this.ws = undefined;
      this.onclose?.();
    });

    ws.on("error", (err: unknown) => {
      this.onerror?.(toError(err));
    });
  }

  private handleRawMessage(data: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      this.onerror?.(new McpTransportError("Received non-JSON WebSocket frame", toError(error)));
      return;
    }

    const result = JSONRPCMessageSchema.safeParse(raw);
    if (!result.success) {
      this.onerror?.(new McpTransportError("Received invalid JSON-RPC message over WebSocket"));
      return;
    }
    this.onmessage?.(result.data);
  }
}
