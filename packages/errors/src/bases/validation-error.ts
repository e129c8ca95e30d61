import { ToolmeshError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { ToolmeshErrorOptions, ValidationIssue } from "../types.js";
import { catalogFields } from "./catalog-fields.js";

type ValidationCode = CodesForBase<"ValidationError">;

type ValidationErrorOptions<C extends ValidationCode> = ToolmeshErrorOptions<C> & {
  issues?: readonly ValidationIssue[];
};

/**
 * Errors caused by invalid input or configuration. HTTP 400.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = "VALIDATION_FAILED"> extends ToolmeshError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues, empty when the failure is not field-level */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions<C>);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | ValidationErrorOptions<C>,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ValidationErrorOptions<ValidationCode> =
      typeof messageOrOptions === "string"
        ? { code: "VALIDATION_FAILED", message: messageOrOptions, issues, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, { cause: opts.cause });
    const fields = catalogFields(opts.code);
    this.code = opts.code as C;
    this.httpStatus = fields.httpStatus;
    this.grpcCode = fields.grpcCode;
    this.domain = fields.domain;
    this.isExpected = fields.isExpected;
    this.issues = opts.issues ?? [];
  }
}
