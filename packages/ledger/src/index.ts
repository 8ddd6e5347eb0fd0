/**
 * @ledgersync/ledger: Deterministic amounts, precision and ledger schema.
 *
 * A pure TypeScript layer with zero runtime dependencies:
 * - All monetary arithmetic uses bigint fractions (no floating point)
 * - Amounts are rounded to their currency's configured increment
 * - Exchange rates are held at the remote's eight-digit precision
 * - Ledger rows are standardized into one canonical schema
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Zero runtime dependencies
 */

// Exact arithmetic
export {
  rational,
  parseDecimal,
  fromScaled,
  pow10,
  add,
  sub,
  mul,
  div,
  neg,
  abs,
  sum,
  compare,
  equals,
  isZero,
  isNegative,
  min,
  max,
  median,
  roundToInteger,
  floorToInteger,
  ceilToInteger,
  roundToIncrement,
  decimalPlaces,
  formatScaled,
  toDecimalString,
  toPlainString,
  ZERO,
  ONE,
} from "./rational.js";

// Precision and rounding
export { CurrencyPrecision, DEFAULT_PRECISION, DEFAULT_INCREMENT } from "./precision.js";
export { roundToPrecision, sumAmounts, negateAmount, isZeroAmount } from "./money-math.js";

// Exchange rates
export {
  FX_RATE_DECIMALS,
  roundRate,
  floorRate,
  ceilRate,
  formatRate,
  convertAmount,
} from "./fx-rate.js";

// Schema
export { standardizeLedger, groupById } from "./standardize.js";
export { ledgerToString } from "./ledger-string.js";

// Types
export type {
  Rational,
  RoundingMode,
  PrecisionOptions,
  LedgerErrorCode,
  LedgerLineInput,
  StandardizeOptions,
} from "./types.js";

export { LedgerError } from "./types.js";
