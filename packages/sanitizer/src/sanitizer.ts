/**
 * LedgerSanitizer: Top-level coordinator
 *
 * Resolves the transitory account once per run, sanitizes the ledger and
 * maps the result to remote journal entries.
 *
 * Usage:
 *   const sanitizer = new LedgerSanitizer({ reportingCurrency: "CHF", accounts });
 *   await sanitizer.setTransitoryAccount("1999");
 *   const lines = await sanitizer.sanitize(rows);
 *   const entries = await sanitizer.toJournal(rows);
 */

import type { Logger } from "pino";
import type { AccountRecord, LedgerLine, RemoteJournalEntry } from "@ledgersync/types";
import { DEFAULT_PRECISION, standardizeLedger } from "@ledgersync/ledger";
import type { CurrencyPrecision, LedgerLineInput } from "@ledgersync/ledger";
import type { LedgerEntity } from "./entity.js";
import { resolveCollectiveCurrency } from "./currency-resolver.js";
import { toRemoteJournal } from "./journal-mapper.js";
import { sanitizeLedger } from "./pipeline.js";
import { TransitoryAccountGuard } from "./transitory-account.js";
import type {
  ReportingAmountResolver,
  ResolutionMode,
  ResolvedRate,
  TransitoryAccount,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerSanitizerConfig {
  readonly reportingCurrency: string;
  /** Account chart holding the transitory account. */
  readonly accounts: LedgerEntity<AccountRecord>;
  readonly transitoryAccount?: string | undefined;
  readonly precision?: CurrencyPrecision | undefined;
  readonly reportingAmounts?: ReportingAmountResolver | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// LedgerSanitizer
// =============================================================================

export class LedgerSanitizer {
  readonly reportingCurrency: string;
  readonly precision: CurrencyPrecision;
  readonly guard: TransitoryAccountGuard;
  private readonly _reportingAmounts: ReportingAmountResolver | undefined;
  private readonly _logger: Logger | undefined;

  constructor(config: LedgerSanitizerConfig) {
    this.reportingCurrency = config.reportingCurrency;
    this.precision = config.precision ?? DEFAULT_PRECISION;
    this._reportingAmounts = config.reportingAmounts;
    this._logger = config.logger;
    this.guard = new TransitoryAccountGuard(config.accounts, {
      reportingCurrency: config.reportingCurrency,
      account: config.transitoryAccount,
      logger: config.logger,
    });
  }

  resolveTransitoryAccount(): Promise<TransitoryAccount> {
    return this.guard.resolveTransitoryAccount();
  }

  setTransitoryAccount(account: string): Promise<void> {
    return this.guard.setTransitoryAccount(account);
  }

  /**
   * Sanitize ledger rows for the remote ledger.
   *
   * @throws {ConfigurationError} before any transformation when the
   *   transitory account is invalid
   */
  async sanitize(lines: readonly LedgerLineInput[]): Promise<LedgerLine[]> {
    const transitoryAccount = await this.guard.resolveTransitoryAccount();
    return sanitizeLedger(lines, {
      reportingCurrency: this.reportingCurrency,
      transitoryAccount,
      precision: this.precision,
      reportingAmounts: this._reportingAmounts,
      logger: this._logger,
    });
  }

  /** Sanitize, then map every transaction to a remote journal entry. */
  async toJournal(lines: readonly LedgerLineInput[]): Promise<RemoteJournalEntry[]> {
    const sanitized = await this.sanitize(lines);
    return toRemoteJournal(sanitized, {
      reportingCurrency: this.reportingCurrency,
      precision: this.precision,
      logger: this._logger,
    });
  }

  /** Currency and rate of the lines of one transaction. */
  resolveRate(lines: readonly LedgerLineInput[], mode: ResolutionMode): ResolvedRate {
    const standardized = standardizeLedger(lines, {
      precision: this.precision,
      reportingCurrency: this.reportingCurrency,
    });
    return resolveCollectiveCurrency(standardized, {
      reportingCurrency: this.reportingCurrency,
      precision: this.precision,
      mode,
      logger: this._logger,
    });
  }
}
