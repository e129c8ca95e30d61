import { ToolmeshError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { ToolmeshErrorOptions } from "../types.js";
import { catalogFields } from "./catalog-fields.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs: states the code should never reach.
 * HTTP 500.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends ToolmeshError {
  readonly _tag = "InternalError" as const;
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
    const opts: ToolmeshErrorOptions<InternalCode> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
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
