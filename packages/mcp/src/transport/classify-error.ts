/**
 * Decides whether a thrown value looks like an HTTP 4xx rejection, which
 * during transport detection means "this endpoint does not speak
 * Streamable HTTP" rather than "the server is broken".
 */

const CLIENT_ERROR_MARKERS: readonly string[] = [
  "400",
  "401",
  "402",
  "403",
  "404",
  "405",
  "406",
  "407",
  "408",
  "409",
  "bad request",
  "unauthorized",
  "forbidden",
  "not found",
  "method not allowed",
  "not acceptable",
  "request timeout",
  "conflict",
];

const RESPONSE_STATUS_KEYS = ["status", "statusCode", "status_code"] as const;

function isClientStatus(status: number): boolean {
  return status >= 400 && status < 500;
}

// Getters on foreign error objects may throw; classification must not.
function readProperty(target: object, key: string): unknown {
  try {
    return Reflect.get(target, key);
  } catch {
    return undefined;
  }
}

function messageLooksClientError(message: string): boolean {
  const lowered = message.toLowerCase();
  return CLIENT_ERROR_MARKERS.some((marker) => lowered.includes(marker));
}

/**
 * Check order: aggregated sub-errors, a numeric `status` (or an HTTP-range
 * numeric `code`), a nested `response` status, then message text.
 */
export function isClientErrorLike(error: unknown): boolean {
  return classify(error, new Set());
}

function classify(error: unknown, seen: Set<object>): boolean {
  if (typeof error === "string") return messageLooksClientError(error);
  if (typeof error !== "object" || error === null) return false;
  if (seen.has(error)) return false;
  seen.add(error);

  const errors = readProperty(error, "errors");
  if (Array.isArray(errors)) {
    return errors.some((inner: unknown) => classify(inner, seen));
  }

  const status = readProperty(error, "status");
  if (typeof status === "number") return isClientStatus(status);

  // StreamableHTTPError and SseError put the HTTP status in `code`
  const code = readProperty(error, "code");
  if (typeof code === "number" && isClientStatus(code)) return true;

  const response = readProperty(error, "response");
  if (typeof response === "object" && response !== null) {
    for (const key of RESPONSE_STATUS_KEYS) {
      const value = readProperty(response, key);
      if (typeof value === "number") return isClientStatus(value);
    }
  }

  const message = readProperty(error, "message");
  return typeof message === "string" && messageLooksClientError(message);
}
