/**
 * @tally/ledger: internal types for the ledger engine.
 *
 * These extend the shared @tally/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - Everything handed out of the engine is readonly
 * - Per-command failures are values, never thrown
 * - Contract violations (bad Money, illegal transitions) throw LedgerError
 */

import type {
  ClientId,
  Money,
  RecordedKind,
  TransactionId,
  TransactionStatus,
} from "@tally/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Read-only view of a client account.
 * `total` is always `available + held`.
 */
export interface ClientAccount {
  readonly clientId: ClientId;
  readonly available: Money;
  readonly held: Money;
  readonly total: Money;
  readonly frozen: boolean;
}

// ─── History Types ───────────────────────────────────────────────────────

/**
 * The original deposit or withdrawal as it was accepted.
 * Never changes after it is recorded; lifecycle lives in TransactionStatus.
 */
export interface RecordedTransaction {
  readonly id: TransactionId;
  readonly kind: RecordedKind;
  readonly clientId: ClientId;
  readonly amount: Money;
}

/** A recorded transaction together with its current status. */
export interface TransactionView {
  readonly transaction: RecordedTransaction;
  readonly status: TransactionStatus;
}

// ─── Apply Results ───────────────────────────────────────────────────────

/** Failure codes returned by the engine for a rejected command. */
export type EngineFailureCode =
  | "INVALID_AMOUNT"
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS"
  | "MISSING_ACCOUNT"
  | "INVALID_TRANSACTION"
  | "DISPUTE_CHARGEBACK"
  | "FROZEN_ACCOUNT";

/**
 * Why a command was rejected.
 * `tx` is the transaction id the command referenced.
 */
export interface EngineFailure {
  readonly code: EngineFailureCode;
  readonly client: ClientId;
  readonly tx: TransactionId;
}

export type ApplyResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly failure: EngineFailure };

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * One reporting row per account.
 * Monetary fields are rounded for display and rendered as decimal strings.
 */
export interface AccountSnapshotRow {
  readonly client: ClientId;
  readonly available: string;
  readonly held: string;
  readonly total: string;
  readonly locked: boolean;
}

// ─── Engine Options ──────────────────────────────────────────────────────

export interface LedgerOptions {
  /** Fractional digits kept internally. Amounts are rescaled to this on entry. */
  readonly decimals?: number | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for contract violations inside the ledger package. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INVALID_COMMAND"
  | "SCALE_MISMATCH"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "ILLEGAL_TRANSITION";

/**
 * Structured error from the ledger package.
 * Thrown for programmer errors only; rejected commands are ApplyResult values.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
