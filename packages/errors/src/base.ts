import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * Plain-object form of a ToolmeshError, safe to log or send over the wire.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  stack?: string | undefined;
  cause?: string | undefined;
}

/**
 * Root of the toolmesh error hierarchy.
 *
 * Concrete classes fill in `code` and the catalog-derived fields; the
 * constructor only records message, metadata, trace and cause.
 */
export abstract class ToolmeshError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error | undefined },
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Check if a value is a ToolmeshError
 */
export function isToolmeshError(error: unknown): error is ToolmeshError {
  return error instanceof ToolmeshError;
}

/**
 * Check if a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
