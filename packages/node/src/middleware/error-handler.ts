/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Errors carrying a ledger or
 * sanitizer code keep it; anything else is a 500 with the message hidden.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<DomainErrorCode, ContentfulStatusCode>> = {
  // Malformed input
  INVALID_AMOUNT: 400,
  INVALID_LINE: 400,
  INVALID_PRECISION: 400,
  EMPTY_TRANSACTION: 400,

  // Input that cannot be booked
  DIVISION_BY_ZERO: 422,
  INCONSISTENT_TRANSACTION: 422,
  INCOHERENT_CURRENCY: 422,
  INCOHERENT_FX_RATE: 422,
  MISSING_AMOUNT: 422,

  // Account chart state
  CONFIGURATION_ERROR: 409,
  DUPLICATE_ACCOUNT: 409,
  UNKNOWN_ACCOUNT: 404,
};

function isDomainErrorCode(code: unknown): code is DomainErrorCode {
  return typeof code === "string" && Object.hasOwn(STATUS_MAP, code);
}

function domainCodeOf(error: Error): DomainErrorCode | undefined {
  return "code" in error && isDomainErrorCode(error.code) ? error.code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCodeOf(err);
  if (code === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
}
