/**
 * @ledgersync/sanitizer: Remote-compatible transaction sanitization.
 *
 * Splits multi-currency transactions, aligns reporting amounts with
 * eight-digit exchange rates, and keeps the transitory account neutral.
 *
 * Components:
 * - resolveCollectiveCurrency: currency and rate of a transaction
 * - splitMultiCurrencyTransaction: one sub-transaction per currency
 * - adjustFxPrecision: residuals to the transitory account
 * - sanitizeLedger: the pipeline over a whole ledger
 * - TransitoryAccountGuard: validates and provisions the clearing account
 * - toRemoteJournalEntry: sanitized lines to remote journal entries
 * - LedgerSanitizer: top-level coordinator
 */

// Coordinator
export { LedgerSanitizer } from "./sanitizer.js";
export type { LedgerSanitizerConfig } from "./sanitizer.js";

// Core
export { resolveCollectiveCurrency, RELATIVE_TOLERANCE } from "./currency-resolver.js";
export type { RateInterval } from "./currency-resolver.js";
export { splitMultiCurrencyTransaction, SPLIT_DESCRIPTION } from "./splitter.js";
export {
  adjustFxPrecision,
  FX_ADJUSTMENT_DESCRIPTION,
  FX_ADJUSTMENT_PREFIX,
  FX_SUFFIX,
} from "./fx-adjuster.js";
export { sanitizeLedger } from "./pipeline.js";
export type { SanitizeOptions } from "./pipeline.js";

// Transitory account and entities
export {
  TransitoryAccountGuard,
  DEFAULT_TRANSITORY_GROUP,
  TRANSITORY_DESCRIPTION,
} from "./transitory-account.js";
export type { TransitoryAccountGuardOptions } from "./transitory-account.js";
export type { LedgerEntity } from "./entity.js";
export { InMemoryAccountChart } from "./account-chart.js";

// Collaborators
export { PriceTable } from "./price-table.js";
export type { PriceRecord } from "./price-table.js";
export { toRemoteJournalEntry, toRemoteJournal } from "./journal-mapper.js";
export type { JournalMapperOptions } from "./journal-mapper.js";

// Helpers
export { lineCurrency, reportingAmountOf, isReportingOnly, foreignCurrencies } from "./lines.js";

// Errors
export {
  SanitizerError,
  IncoherentCurrencyError,
  IncoherentFXRateError,
  MissingAmountError,
  ConfigurationError,
  EmptyTransactionError,
  InconsistentTransactionError,
} from "./errors.js";
export type { SanitizerErrorCode } from "./errors.js";

// Types
export type {
  TransitoryAccount,
  ResolutionMode,
  ResolveOptions,
  ResolvedRate,
  SanitizeContext,
  ReportingAmountResolver,
} from "./types.js";
