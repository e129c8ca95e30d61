/**
 * @toolmesh/errors
 *
 * Shared error taxonomy for toolmesh.
 *
 * The error system is built on behavioral base types:
 * ValidationError, TimeoutError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isToolmeshError, ToolmeshError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isClientError,
  isErrorStatus,
  isServerError,
  isValidErrorCode,
  toError,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError } from "./bases/external-error.js";
export { InternalError } from "./bases/internal-error.js";
export { TimeoutError } from "./bases/timeout-error.js";
export { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ExternalCodes,
  InternalCodes,
  TimeoutCodes,
  ToolmeshErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// MCP ERRORS
// ============================================================================

export {
  McpConfigurationError,
  McpConnectionFailedError,
  McpDiscoveryFailedError,
  McpHttpStatusError,
  McpInitializationFailedError,
  McpProbeTimeoutError,
  McpToolCallFailedError,
  McpTransportError,
} from "./mcp.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@toolmesh/errors";
