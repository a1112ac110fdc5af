/**
 * Financial Types
 *
 * Core financial primitives for deterministic ledger replay.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Every amount carries its own scale (number of fractional digits)
 * - A single implicit currency; there is no conversion between units
 */

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic happens on bigint values scaled by `decimals`.
 */
export interface Money {
  /** Decimal string, e.g. "100.5000", "-0.0001" */
  readonly amount: string;

  /** Number of fractional digits `amount` is expressed in. */
  readonly decimals: number;
}

/** Account holder identifier (unsigned 16-bit range). */
export type ClientId = number;

/** Deposit/withdrawal identifier (unsigned 32-bit range), unique per ledger. */
export type TransactionId = number;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TRANSACTION_ID = 0xffff_ffff;

/** Kinds of transactions that are recorded in history. */
export type RecordedKind = "deposit" | "withdrawal";

/**
 * Lifecycle of a recorded transaction.
 *
 * normal → disputed → normal (resolve)
 *                   → charged_back (terminal)
 */
export type TransactionStatus = "normal" | "disputed" | "charged_back";
