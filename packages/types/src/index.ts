/**
 * @ledgersync/types: Shared domain types for the ledgersync stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming code, not in the types
 */

// Financial types
export type {
  Currency,
  DecimalString,
  LedgerLine,
  TransactionKind,
  AccountRecord,
} from "./financial.js";

// Remote journal types
export type {
  RemoteIndividualEntry,
  RemoteCollectiveItem,
  RemoteCollectiveEntry,
  RemoteJournalEntry,
} from "./remote.js";

