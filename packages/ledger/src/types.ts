/**
 * @ledgersync/ledger: Internal types for the arithmetic and schema layer.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid amounts throw, never silently succeed
 */

import type { CurrencyPrecision } from "./precision.js";

// ─── Arithmetic Types ────────────────────────────────────────────────────

/**
 * An exact fraction `num / den` with `den > 0`, kept in lowest terms.
 * Every monetary and FX computation runs on these; binary floating
 * point never touches an amount.
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

/**
 * Tie-breaking rule when a value lies exactly halfway between two
 * representable amounts.
 *
 * - "half-even" - banker's rounding (2.345 → 2.34, 2.355 → 2.36)
 * - "half-up"   - half away from zero (2.345 → 2.35, -2.345 → -2.35)
 */
export type RoundingMode = "half-even" | "half-up";

// ─── Precision Types ─────────────────────────────────────────────────────

/**
 * Options for building a precision table.
 */
export interface PrecisionOptions {
  /** Increment used for currencies without an explicit entry. Default "0.01". */
  readonly defaultPrecision?: string | undefined;
  /** Per-currency increments, e.g. `{ JPY: "1", CHF: "0.01" }`. */
  readonly currencies?: Readonly<Record<string, string>> | undefined;
  readonly roundingMode?: RoundingMode | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for arithmetic and schema operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_PRECISION"
  | "DIVISION_BY_ZERO"
  | "INCONSISTENT_TRANSACTION"
  | "INVALID_LINE";

/**
 * Structured error from the ledger layer.
 * Thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Schema Types ────────────────────────────────────────────────────────

/**
 * A ledger row as it arrives from an external table or API body.
 * Optional columns may be missing, empty or null; standardization
 * turns every input row into a complete `LedgerLine`.
 */
export interface LedgerLineInput {
  readonly id: string;
  readonly date: string;
  readonly account?: string | null | undefined;
  readonly counterAccount?: string | null | undefined;
  readonly amount: string;
  readonly reportingAmount?: string | null | undefined;
  readonly currency?: string | null | undefined;
  readonly taxCode?: string | null | undefined;
  readonly description?: string | null | undefined;
  readonly document?: string | null | undefined;
}

/**
 * Options for ledger standardization.
 */
export interface StandardizeOptions {
  readonly precision?: CurrencyPrecision | undefined;
  /** Currency whose precision applies to reporting amounts */
  readonly reportingCurrency?: string | undefined;
}
