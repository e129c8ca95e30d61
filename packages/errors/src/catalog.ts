/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the toolmesh packages. Each code maps to an
 * HTTP status, a gRPC canonical code, and one of the base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, mcp
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Service unavailable",
    description: "A dependency is temporarily unavailable",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Operation timeout",
    description: "The operation exceeded the deadline",
  },

  // ============================================================================
  // VALIDATION ERRORS - Generic input failures
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // MCP ERRORS - Server configuration, transport negotiation and discovery
  // ============================================================================
  MCP_CONFIG_INVALID: {
    domain: "mcp",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "MCP server configuration invalid",
    description: "The server entry is structurally invalid or self-contradictory",
  },
  MCP_CONNECTION_FAILED: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP connection failed",
    description: "Failed to open a transport to the MCP server",
  },
  MCP_INITIALIZATION_FAILED: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP initialization failed",
    description: "MCP protocol handshake or capability negotiation failed",
  },
  MCP_TOOL_DISCOVERY_FAILED: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP tool discovery failed",
    description: "Listing or describing the server's tools failed after connecting",
  },
  MCP_HTTP_STATUS: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP endpoint returned an error status",
    description: "The HTTP endpoint answered with a status that is neither success nor 4xx",
  },
  MCP_PROBE_TIMEOUT: {
    domain: "mcp",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "MCP transport probe timed out",
    description: "The Streamable HTTP detection request did not complete in time",
  },
  MCP_TRANSPORT_ERROR: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP transport error",
    description: "A transport-level communication error occurred",
  },
  MCP_TOOL_CALL_FAILED: {
    domain: "mcp",
    httpStatus: 502,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "MCP tool call failed",
    description: "The MCP tool invocation returned an error",
  },
} as const satisfies Record<string, ErrorCatalogShape>;

interface ErrorCatalogShape {
  readonly domain: string;
  readonly httpStatus: number;
  readonly grpcCode: string;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

// ============================================================================
// DERIVED TYPES
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
