/**
 * @ledgersync/sanitizer: Error types.
 *
 * Every failure of the sanitizer is a data-correctness problem, not a
 * transient one: errors are thrown immediately, never retried, and a
 * failed invocation returns no partial result.
 */

/** Error codes for sanitizer operations. */
export type SanitizerErrorCode =
  | "INCOHERENT_CURRENCY"
  | "INCOHERENT_FX_RATE"
  | "MISSING_AMOUNT"
  | "CONFIGURATION_ERROR"
  | "EMPTY_TRANSACTION"
  | "INCONSISTENT_TRANSACTION"
  | "DUPLICATE_ACCOUNT"
  | "UNKNOWN_ACCOUNT";

/**
 * Structured error from the sanitizer.
 */
export class SanitizerError extends Error {
  public readonly code: SanitizerErrorCode;

  constructor(code: SanitizerErrorCode, message: string) {
    super(message);
    this.name = "SanitizerError";
    this.code = code;
  }
}

/**
 * A collective transaction references more than one currency besides
 * the reporting currency.
 */
export class IncoherentCurrencyError extends SanitizerError {
  constructor(transactionId: string, currencies: readonly string[]) {
    super(
      "INCOHERENT_CURRENCY",
      `Transaction "${transactionId}" uses ${currencies.join(", ")}: only the reporting ` +
        "currency plus a single foreign currency are permitted in one collective transaction",
    );
    this.name = "IncoherentCurrencyError";
  }
}

/**
 * No exchange rate reconciles every line's amount with its
 * reporting-currency amount.
 */
export class IncoherentFXRateError extends SanitizerError {
  constructor(transactionId: string, detail: string) {
    super("INCOHERENT_FX_RATE", `Incoherent FX rates in transaction "${transactionId}": ${detail}`);
    this.name = "IncoherentFXRateError";
  }
}

/**
 * A line needs a reporting-currency amount that was never resolved.
 */
export class MissingAmountError extends SanitizerError {
  constructor(message: string) {
    super("MISSING_AMOUNT", message);
    this.name = "MissingAmountError";
  }
}

/**
 * The transitory account is unset, missing, or in the wrong currency.
 */
export class ConfigurationError extends SanitizerError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigurationError";
  }
}

/**
 * A transaction group without lines.
 */
export class EmptyTransactionError extends SanitizerError {
  constructor(message = "Expecting at least one line per transaction") {
    super("EMPTY_TRANSACTION", message);
    this.name = "EmptyTransactionError";
  }
}

/**
 * A transaction that cannot be mapped to a remote entry as given
 * (mixed dates, missing accounts).
 */
export class InconsistentTransactionError extends SanitizerError {
  constructor(message: string) {
    super("INCONSISTENT_TRANSACTION", message);
    this.name = "InconsistentTransactionError";
  }
}
