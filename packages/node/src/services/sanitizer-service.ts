/**
 * SanitizerService: Composition root for the ledger packages.
 *
 * Route handlers delegate to this service; they never import the
 * sanitizer directly. One instance serves one reporting currency,
 * one account chart and one price history.
 */

import type { Logger } from "pino";
import type { AccountRecord, LedgerLine, RemoteJournalEntry } from "@ledgersync/types";
import { formatRate, groupById } from "@ledgersync/ledger";
import type { CurrencyPrecision, LedgerLineInput } from "@ledgersync/ledger";
import {
  ConfigurationError,
  InMemoryAccountChart,
  LedgerSanitizer,
  PriceTable,
} from "@ledgersync/sanitizer";
import type { PriceRecord, ResolutionMode, TransitoryAccount } from "@ledgersync/sanitizer";

// =============================================================================
// Configuration
// =============================================================================

export interface SanitizerServiceConfig {
  readonly reportingCurrency: string;
  readonly precision: CurrencyPrecision;
  readonly accounts?: readonly AccountRecord[] | undefined;
  readonly prices?: readonly PriceRecord[] | undefined;
  readonly logger?: Logger | undefined;
}

export interface SanitizeOverrides {
  readonly reportingCurrency?: string | undefined;
  readonly transitoryAccount?: string | undefined;
}

export interface SanitizeResult {
  readonly lines: readonly LedgerLine[];
  readonly summary: {
    readonly inputLines: number;
    readonly outputLines: number;
    readonly transactions: number;
  };
}

export interface RateResult {
  readonly currency: string;
  readonly rate: string;
  readonly withinTolerance: boolean;
}

export type Readiness =
  | { readonly ready: true; readonly transitoryAccount: TransitoryAccount }
  | { readonly ready: false; readonly reason: string };

// =============================================================================
// Service
// =============================================================================

export class SanitizerService {
  readonly reportingCurrency: string;
  readonly precision: CurrencyPrecision;
  readonly accounts: InMemoryAccountChart;
  readonly prices: PriceTable;
  readonly sanitizer: LedgerSanitizer;
  private readonly _logger: Logger | undefined;

  constructor(config: SanitizerServiceConfig) {
    this.reportingCurrency = config.reportingCurrency;
    this.precision = config.precision;
    this._logger = config.logger;
    this.accounts = new InMemoryAccountChart(config.accounts ?? []);
    this.prices = new PriceTable(config.prices ?? [], {
      reportingCurrency: config.reportingCurrency,
      precision: config.precision,
    });
    this.sanitizer = new LedgerSanitizer({
      reportingCurrency: config.reportingCurrency,
      accounts: this.accounts,
      precision: config.precision,
      reportingAmounts: this.prices,
      logger: config.logger,
    });
  }

  // ─── Sanitization ────────────────────────────────────────────────────

  /**
   * Sanitize ledger rows. Overrides apply to this call only; a foreign
   * reporting currency has no price history, so its rows must carry
   * their reporting amounts.
   */
  async sanitize(
    lines: readonly LedgerLineInput[],
    overrides: SanitizeOverrides = {},
  ): Promise<SanitizeResult> {
    const sanitized = await this._sanitizerFor(overrides).sanitize(lines);
    return {
      lines: sanitized,
      summary: {
        inputLines: lines.length,
        outputLines: sanitized.length,
        transactions: groupById(sanitized).size,
      },
    };
  }

  resolveRate(lines: readonly LedgerLineInput[], mode: ResolutionMode): RateResult {
    const resolved = this.sanitizer.resolveRate(lines, mode);
    return {
      currency: resolved.currency,
      rate: formatRate(resolved.rate),
      withinTolerance: resolved.withinTolerance,
    };
  }

  previewJournal(lines: readonly LedgerLineInput[]): Promise<RemoteJournalEntry[]> {
    return this.sanitizer.toJournal(lines);
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  listAccounts(): Promise<readonly AccountRecord[]> {
    return this.accounts.list();
  }

  getTransitoryAccount(): Promise<TransitoryAccount> {
    return this.sanitizer.resolveTransitoryAccount();
  }

  async setTransitoryAccount(account: string): Promise<TransitoryAccount> {
    await this.sanitizer.setTransitoryAccount(account);
    return this.sanitizer.resolveTransitoryAccount();
  }

  /** Ready once the transitory account resolves. */
  async readiness(): Promise<Readiness> {
    try {
      const transitoryAccount = await this.sanitizer.resolveTransitoryAccount();
      return { ready: true, transitoryAccount };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { ready: false, reason: error.message };
      }
      throw error;
    }
  }

  private _sanitizerFor(overrides: SanitizeOverrides): LedgerSanitizer {
    const reportingCurrency = overrides.reportingCurrency ?? this.reportingCurrency;
    if (
      reportingCurrency === this.reportingCurrency &&
      overrides.transitoryAccount === undefined
    ) {
      return this.sanitizer;
    }
    return new LedgerSanitizer({
      reportingCurrency,
      accounts: this.accounts,
      transitoryAccount: overrides.transitoryAccount ?? this.sanitizer.guard.account ?? undefined,
      precision: this.precision,
      reportingAmounts: reportingCurrency === this.reportingCurrency ? this.prices : undefined,
      logger: this._logger,
    });
  }
}
