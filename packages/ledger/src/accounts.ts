/**
 * @tally/ledger: account book.
 *
 * Holds one balance record per client. Records are created lazily and
 * never removed. Only the engine mutates them; everything handed out
 * through get()/getAll() is a detached read-only view.
 */

import type { ClientId, Money } from "@tally/types";
import type { ClientAccount } from "./types.js";
import { addMoney, zeroMoney } from "./money-math.js";

/**
 * Mutable balance record owned by the account book.
 * `frozen` only ever moves from false to true.
 */
export interface AccountRecord {
  readonly clientId: ClientId;
  available: Money;
  held: Money;
  frozen: boolean;
}

export class AccountBook {
  private readonly _accounts: Map<ClientId, AccountRecord> = new Map();
  private readonly _decimals: number;

  constructor(decimals: number) {
    this._decimals = decimals;
  }

  /**
   * Get the record for a client, creating an empty one if none exists.
   */
  open(clientId: ClientId): AccountRecord {
    let record = this._accounts.get(clientId);
    if (record === undefined) {
      record = {
        clientId,
        available: zeroMoney(this._decimals),
        held: zeroMoney(this._decimals),
        frozen: false,
      };
      this._accounts.set(clientId, record);
    }
    return record;
  }

  /**
   * Get the mutable record for a client without creating one.
   */
  find(clientId: ClientId): AccountRecord | undefined {
    return this._accounts.get(clientId);
  }

  has(clientId: ClientId): boolean {
    return this._accounts.has(clientId);
  }

  /**
   * Get a read-only view of a client's account.
   */
  get(clientId: ClientId): ClientAccount | undefined {
    const record = this._accounts.get(clientId);
    return record === undefined ? undefined : toView(record);
  }

  /**
   * All accounts, in creation order.
   */
  getAll(): readonly ClientAccount[] {
    return [...this._accounts.values()].map(toView);
  }

  get count(): number {
    return this._accounts.size;
  }
}

function toView(record: AccountRecord): ClientAccount {
  return {
    clientId: record.clientId,
    available: record.available,
    held: record.held,
    total: addMoney(record.available, record.held),
    frozen: record.frozen,
  };
}
