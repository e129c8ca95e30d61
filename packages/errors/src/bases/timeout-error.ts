import { ToolmeshError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { ToolmeshErrorOptions } from "../types.js";
import { catalogFields } from "./catalog-fields.js";

type TimeoutCode = CodesForBase<"TimeoutError">;

/**
 * Errors raised when an operation exceeds its deadline. HTTP 504.
 */
export class TimeoutError<C extends TimeoutCode = "INTERNAL_TIMEOUT"> extends ToolmeshError {
  readonly _tag = "TimeoutError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Deadline that was exceeded, when known */
  readonly timeoutMs: number | undefined;

  constructor(options: ToolmeshErrorOptions<C> & { timeoutMs?: number });
  constructor(message: string, timeoutMs?: number, metadata?: Record<string, string>);
  constructor(
    messageOrOptions: string | (ToolmeshErrorOptions<C> & { timeoutMs?: number }),
    timeoutMs?: number,
    metadata?: Record<string, string>,
  ) {
    const opts: ToolmeshErrorOptions<TimeoutCode> & { timeoutMs?: number } =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_TIMEOUT", message: messageOrOptions, metadata, timeoutMs }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, { cause: opts.cause });
    const fields = catalogFields(opts.code);
    this.code = opts.code as C;
    this.httpStatus = fields.httpStatus;
    this.grpcCode = fields.grpcCode;
    this.domain = fields.domain;
    this.isExpected = fields.isExpected;
    this.timeoutMs = opts.timeoutMs;
  }
}
