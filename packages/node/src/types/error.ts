/**
 * Error envelope returned with every non-2xx response:
 * { error: { code, message, details? } }
 */

import type { LedgerErrorCode } from "@ledgersync/ledger";
import type { SanitizerErrorCode } from "@ledgersync/sanitizer";

/** Codes thrown by the ledger and sanitizer packages. */
export type DomainErrorCode = LedgerErrorCode | SanitizerErrorCode;

/** Codes the HTTP layer raises itself. */
export type HttpErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "INTERNAL_ERROR";

export type ApiErrorCode = DomainErrorCode | HttpErrorCode;

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

export function validationErrorEnvelope(
  message: string,
  issues?: readonly ValidationIssue[],
): ErrorEnvelope {
  return createErrorEnvelope("VALIDATION_ERROR", message, issues === undefined ? undefined : { issues });
}
