import { ToolmeshError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { ToolmeshErrorOptions } from "../types.js";
import { catalogFields } from "./catalog-fields.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by runtime failures in external dependencies: a child
 * process, a remote endpoint, a protocol peer. HTTP 502/503.
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = "INTERNAL_UNAVAILABLE"> extends ToolmeshError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: ToolmeshErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | ToolmeshErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ToolmeshErrorOptions<ExternalCode> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_UNAVAILABLE", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, { cause: opts.cause });
    const fields = catalogFields(opts.code);
    this.code = opts.code as C;
    this.httpStatus = fields.httpStatus;
    this.grpcCode = fields.grpcCode;
    this.domain = fields.domain;
    this.isExpected = fields.isExpected;
  }
}
