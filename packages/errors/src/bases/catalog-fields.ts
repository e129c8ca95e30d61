import {
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";

export interface CatalogFields {
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
}

/** Catalog-derived fields shared by every base error type. */
export function catalogFields(code: ErrorCode): CatalogFields {
  const entry = ERROR_CATALOG[code];
  return {
    httpStatus: entry.httpStatus,
    grpcCode: entry.grpcCode,
    domain: entry.domain,
    isExpected: entry.isExpected,
  };
}
