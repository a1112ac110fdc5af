/**
 * @tally/ledger: deterministic client ledger engine.
 *
 * A pure TypeScript engine with no runtime dependencies.
 * Replays deposits, withdrawals, disputes, resolutions and chargebacks
 * into per-client balances:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Rejected commands are returned as values and change nothing
 * - Recorded transactions are immutable; only their status moves
 * - Rounding happens only when a snapshot is taken
 */

// Core engine
export { Ledger, DEFAULT_DECIMALS, describeFailure } from "./ledger.js";

// Tables
export { AccountBook } from "./accounts.js";
export type { AccountRecord } from "./accounts.js";
export { TransactionHistory } from "./history.js";

// Reporting
export { extractSnapshot, DISPLAY_DECIMALS } from "./snapshot.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  toMoney,
  validateMoney,
  assertSameScale,
  addMoney,
  subtractMoney,
  negateMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  rescaleMoney,
  roundMoney,
} from "./money-math.js";

// Types
export type {
  ClientAccount,
  RecordedTransaction,
  TransactionView,
  EngineFailureCode,
  EngineFailure,
  ApplyResult,
  AccountSnapshotRow,
  LedgerOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
