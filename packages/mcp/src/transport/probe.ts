/**
 * Streamable HTTP detection: POST an `initialize` request and read the
 * status. Success means the endpoint speaks Streamable HTTP, a 4xx means it
 * probably only speaks the legacy SSE protocol.
 */

import type { OAuthClientProvider } from "@modelcontextprotocol/sdk/client/auth.js";
import {
  McpHttpStatusError,
  McpProbeTimeoutError,
  McpTransportError,
  getErrorMessage,
  isClientError,
  toError,
} from "@toolmesh/errors";
import {
  DEFAULT_TIMEOUT_MS,
  PROBE_CLIENT_INFO,
  PROBE_PROTOCOL_VERSION,
  STREAMABLE_HTTP_ACCEPT,
} from "../constants.js";
import { type McpLogger, createNoopLogger } from "../logger.js";
import { isClientErrorLike } from "./classify-error.js";

export interface ProbeOptions {
  /** Sent with the request; Content-Type and Accept are always overridden */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs?: number | undefined;
  /** Its current access token is sent as a bearer Authorization header */
  readonly authProvider?: OAuthClientProvider | undefined;
  readonly logger?: McpLogger | undefined;
}

export interface ProbeRequest {
  readonly jsonrpc: "2.0";
  readonly id: string;
  readonly method: "initialize";
  readonly params: {
    readonly protocolVersion: string;
    readonly capabilities: Record<string, never>;
    readonly clientInfo: { readonly name: string; readonly version: string };
  };
}

export function buildProbeRequest(now: number = Date.now()): ProbeRequest {
  return {
    jsonrpc: "2.0",
    id: `transport-test-${now}`,
    method: "initialize",
    params: {
      protocolVersion: PROBE_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { ...PROBE_CLIENT_INFO },
    },
  };
}

async function buildProbeHeaders(options: ProbeOptions): Promise<Headers> {
  const headers = new Headers(options.headers);
  if (options.authProvider && !headers.has("authorization")) {
    const tokens = await options.authProvider.tokens();
    if (tokens?.access_token) {
      headers.set("Authorization", `Bearer ${tokens.access_token}`);
    }
  }
  headers.set("Content-Type", "application/json");
  headers.set("Accept", STREAMABLE_HTTP_ACCEPT);
  return headers;
}

async function releaseBody(response: Response, logger: McpLogger): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug(`Failed to discard probe response body: ${getErrorMessage(error)}`);
  }
}

/**
 * Returns true when the endpoint accepts Streamable HTTP, false when it
 * rejects the request with a 4xx.
 *
 * @throws McpHttpStatusError for any other non-success status
 * @throws McpProbeTimeoutError when no response arrives in time
 * @throws McpTransportError for network failures that do not look like a 4xx
 */
export async function probeStreamableHttp(
  url: string | URL,
  options: ProbeOptions = {},
): Promise<boolean> {
  const target = url.toString();
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger ?? createNoopLogger();
  const headers = await buildProbeHeaders(options);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  try {
    logger.debug(`Testing Streamable HTTP: POST InitializeRequest to ${target}`);
    response = await fetch(target, {
      method: "POST",
      headers,
      body: JSON.stringify(buildProbeRequest()),
      // 3xx is reported as a status, never followed
      redirect: "manual",
      signal: controller.signal,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new McpProbeTimeoutError(target, timeoutMs);
    }
    if (isClientErrorLike(error)) {
      logger.debug(`4xx-like error while probing ${target}: ${getErrorMessage(error)}`);
      return false;
    }
    throw new McpTransportError(
      `Streamable HTTP probe of ${target} failed: ${getErrorMessage(error)}`,
      toError(error),
    );
  } finally {
    clearTimeout(timer);
  }

  await releaseBody(response, logger);
  logger.debug(
    `Transport test response: ${response.status} ${response.headers.get("content-type") ?? "N/A"}`,
  );

  if (response.ok) return true;
  if (isClientError(response.status)) {
    logger.debug(`Received ${response.status} from ${target}, Streamable HTTP not supported`);
    return false;
  }
  throw new McpHttpStatusError(target, response.status, response.statusText);
}
