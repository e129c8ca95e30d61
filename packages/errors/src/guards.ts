/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { ToolmeshError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/** Check if an error is an ExternalError (dependency/runtime failure) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError (bug) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a ToolmeshError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: ToolmeshError,
  code: C,
): error is ToolmeshError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for values that carry no `isExpected` flag.
 */
export function isExpectedError(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
