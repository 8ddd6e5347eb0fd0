/**
 * @ledgersync/sanitizer: Types for transaction sanitization.
 *
 * The sanitizer turns an arbitrary multi-currency ledger into transactions
 * the remote bookkeeping service can store: at most one foreign currency
 * per transaction, and reporting amounts that agree with a single
 * eight-digit exchange rate.
 */

import type { Logger } from "pino";
import type { CurrencyPrecision, Rational } from "@ledgersync/ledger";

// =============================================================================
// Transitory Account
// =============================================================================

/**
 * The clearing account, validated to exist and to be denominated in the
 * reporting currency. Obtained once per pipeline run from the guard.
 */
export interface TransitoryAccount {
  readonly account: string;
  readonly currency: string;
}

// =============================================================================
// Currency Resolution
// =============================================================================

/**
 * - "strict"  - throw when no rate reproduces every line
 * - "lenient" - fall back to the preferred rate, logging a warning
 */
export type ResolutionMode = "strict" | "lenient";

export interface ResolveOptions {
  readonly reportingCurrency: string;
  readonly precision: CurrencyPrecision;
  readonly mode: ResolutionMode;
  readonly logger?: Logger | undefined;
}

/**
 * Currency and eight-digit rate of a collective transaction.
 * `withinTolerance` is false only for a lenient fallback rate.
 */
export interface ResolvedRate {
  readonly currency: string;
  readonly rate: Rational;
  readonly withinTolerance: boolean;
}

// =============================================================================
// Splitting and Adjustment
// =============================================================================

/**
 * Settings shared by the splitter, the adjuster and the pipeline.
 */
export interface SanitizeContext {
  readonly reportingCurrency: string;
  readonly transitoryAccount: TransitoryAccount;
  readonly precision: CurrencyPrecision;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// FX Rate Lookup
// =============================================================================

/**
 * Converts a foreign amount to the reporting currency as of a date.
 * Used to fill reporting amounts the caller left empty.
 */
export interface ReportingAmountResolver {
  reportingAmount(amount: string, currency: string, date: string): string;
}
