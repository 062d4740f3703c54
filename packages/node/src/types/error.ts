/**
 * Error envelope: `{ error: { code, message, details? } }`.
 *
 * Domain codes (DistributorError, CustodyError, EventStoreError) pass
 * through unchanged; the HTTP layer adds its own few.
 */

import type { ZodError } from "zod";

export type ApiErrorCode = "VALIDATION_ERROR" | "UNAUTHORIZED" | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function createErrorEnvelope(
  code: ErrorDetail["code"],
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/** VALIDATION_ERROR envelope listing each failing field by dotted path. */
export function validationEnvelope(message: string, error?: ZodError): ErrorEnvelope {
  if (error === undefined) {
    return createErrorEnvelope("VALIDATION_ERROR", message);
  }
  const issues: ValidationIssue[] = error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return createErrorEnvelope("VALIDATION_ERROR", message, { issues });
}
