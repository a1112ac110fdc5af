/**
 * Command Types
 *
 * The five operations a client can submit to the ledger.
 * Each variant carries only the fields it needs; deposits and
 * withdrawals are the only commands with an amount.
 */

import type { ClientId, Money, TransactionId } from "./financial.js";

export type CommandType =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Moves funds into or out of an account. Recorded in history. */
export interface FundsCommand {
  readonly type: "deposit" | "withdrawal";
  readonly client: ClientId;
  readonly tx: TransactionId;
  readonly amount: Money;
}

/** Acts on a previously recorded deposit or withdrawal. Never recorded itself. */
export interface ClaimCommand {
  readonly type: "dispute" | "resolve" | "chargeback";
  readonly client: ClientId;
  readonly tx: TransactionId;
}

export type Command = FundsCommand | ClaimCommand;
