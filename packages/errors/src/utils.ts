import { ToolmeshError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Wrap an unknown thrown value into a ToolmeshError.
 * ToolmeshErrors pass through; anything else becomes an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): ToolmeshError {
  if (error instanceof ToolmeshError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Narrow an unknown thrown value to an Error, for use as a `cause`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Check if an HTTP status code indicates an error
 */
export function isErrorStatus(status: number): boolean {
  return status >= 400;
}

/**
 * Check if an HTTP status code indicates a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500;
}

/**
 * Check if an HTTP status code indicates a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600;
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - All HTTP status codes are valid (100-599)
 * - Every code is prefixed by its domain, except generic internal/validation codes
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const [code, entry] of Object.entries(ERROR_CATALOG)) {
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (entry.httpStatus < 100 || entry.httpStatus >= 600) {
      errors.push(`Code '${code}' has invalid HTTP status ${entry.httpStatus}`);
    }

    if (entry.domain === "mcp" && !code.startsWith("MCP_")) {
      errors.push(`Code '${code}' is in domain 'mcp' but lacks the MCP_ prefix`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
