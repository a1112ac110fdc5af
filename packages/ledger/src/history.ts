/**
 * @tally/ledger: transaction history.
 *
 * Two independent stores keyed by transaction id:
 * - the original deposit/withdrawal record (immutable once inserted)
 * - its lifecycle status
 *
 * Rules:
 * - An id is inserted at most once
 * - Records are never removed
 * - Status follows normal → disputed → {normal, charged_back};
 *   charged_back is terminal
 */

import type { TransactionId, TransactionStatus } from "@tally/types";
import type { RecordedTransaction, TransactionView } from "./types.js";
import { LedgerError } from "./types.js";

const TRANSITIONS: Readonly<Record<TransactionStatus, readonly TransactionStatus[]>> = {
  normal: ["disputed"],
  disputed: ["normal", "charged_back"],
  charged_back: [],
} as const;

export class TransactionHistory {
  private readonly _records: Map<TransactionId, RecordedTransaction> = new Map();
  private readonly _statuses: Map<TransactionId, TransactionStatus> = new Map();

  has(id: TransactionId): boolean {
    return this._records.has(id);
  }

  /**
   * Insert a newly accepted transaction with status "normal".
   * Throws if the id was already recorded.
   */
  record(transaction: RecordedTransaction): void {
    if (this._records.has(transaction.id)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction already recorded: ${String(transaction.id)}`,
      );
    }
    this._records.set(transaction.id, { ...transaction });
    this._statuses.set(transaction.id, "normal");
  }

  get(id: TransactionId): TransactionView | undefined {
    const transaction = this._records.get(id);
    const status = this._statuses.get(id);
    if (transaction === undefined || status === undefined) {
      return undefined;
    }
    return { transaction, status };
  }

  /**
   * Move a transaction to its next status.
   * Throws on an unknown id or a transition the lifecycle does not allow.
   */
  transition(id: TransactionId, next: TransactionStatus): void {
    const current = this._statuses.get(id);
    if (current === undefined) {
      throw new LedgerError("UNKNOWN_TRANSACTION", `Unknown transaction: ${String(id)}`);
    }
    if (!TRANSITIONS[current].includes(next)) {
      throw new LedgerError(
        "ILLEGAL_TRANSITION",
        `Transaction ${String(id)} cannot move from "${current}" to "${next}"`,
      );
    }
    this._statuses.set(id, next);
  }

  get count(): number {
    return this._records.size;
  }
}
