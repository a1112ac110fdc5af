/**
 * @tally/ledger: core Ledger class.
 *
 * Replays client commands into account balances. The ledger owns two
 * tables: the account book (by client) and the transaction history
 * (by transaction id). Nothing else mutates them.
 *
 * API surface:
 * - apply(): the only write operation
 * - getAccount() / getAccounts(): read-only account views
 * - getTransaction(): a recorded transaction and its status
 * - snapshot(): display-rounded rows ordered by client
 *
 * A rejected command returns { ok: false, failure } and leaves both
 * tables untouched. apply() never throws for a well-formed Command.
 */

import type {
  ClaimCommand,
  ClientId,
  Command,
  FundsCommand,
  Money,
  TransactionId,
} from "@tally/types";
import { isCommand } from "@tally/types";
import { AccountBook } from "./accounts.js";
import { TransactionHistory } from "./history.js";
import {
  addMoney,
  compareMoney,
  isPositive,
  negateMoney,
  rescaleMoney,
  subtractMoney,
} from "./money-math.js";
import { DISPLAY_DECIMALS, extractSnapshot } from "./snapshot.js";
import type {
  AccountSnapshotRow,
  ApplyResult,
  ClientAccount,
  EngineFailure,
  EngineFailureCode,
  LedgerOptions,
  RecordedTransaction,
  TransactionView,
} from "./types.js";
import { LedgerError } from "./types.js";

/** Internal precision when none is configured. */
export const DEFAULT_DECIMALS = 12;

const OK: ApplyResult = { ok: true };

function reject(code: EngineFailureCode, command: Command): ApplyResult {
  return { ok: false, failure: { code, client: command.client, tx: command.tx } };
}

/**
 * Amount moved between available and held when a transaction is disputed.
 * Deposits hold their amount; withdrawals hold its negation.
 */
function disputedHold(transaction: RecordedTransaction): Money {
  return transaction.kind === "deposit" ? transaction.amount : negateMoney(transaction.amount);
}

/**
 * Single-pass ledger engine.
 *
 * Commands must be applied in input order; later commands depend on
 * the exact state earlier ones left behind.
 */
export class Ledger {
  private readonly _decimals: number;
  private readonly _accounts: AccountBook;
  private readonly _history: TransactionHistory = new TransactionHistory();

  constructor(options?: LedgerOptions) {
    const decimals = options?.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < DISPLAY_DECIMALS) {
      throw new LedgerError(
        "INVALID_MONEY",
        `Ledger precision must be an integer of at least ${String(DISPLAY_DECIMALS)}, got: ${String(decimals)}`,
      );
    }
    this._decimals = decimals;
    this._accounts = new AccountBook(decimals);
  }

  /** Fractional digits kept for every balance. */
  get decimals(): number {
    return this._decimals;
  }

  // ─── Core Apply (The Only Write Operation) ───────────────────────────

  /**
   * @throws {LedgerError} INVALID_COMMAND if the value is not a well-formed Command
   */
  apply(command: Command): ApplyResult {
    if (!isCommand(command)) {
      throw new LedgerError("INVALID_COMMAND", `Malformed command: ${JSON.stringify(command)}`);
    }
    switch (command.type) {
      case "deposit":
        return this._deposit(command);
      case "withdrawal":
        return this._withdraw(command);
      case "dispute":
        return this._dispute(command);
      case "resolve":
        return this._resolve(command);
      case "chargeback":
        return this._chargeback(command);
    }
  }

  private _deposit(command: FundsCommand): ApplyResult {
    const amount = this._acceptAmount(command.amount);
    if (amount === undefined) {
      return reject("INVALID_AMOUNT", command);
    }
    if (this._history.has(command.tx)) {
      return reject("DUPLICATE_TRANSACTION", command);
    }

    const account = this._accounts.open(command.client);
    account.available = addMoney(account.available, amount);
    this._history.record({ id: command.tx, kind: "deposit", clientId: command.client, amount });
    return OK;
  }

  private _withdraw(command: FundsCommand): ApplyResult {
    const amount = this._acceptAmount(command.amount);
    if (amount === undefined) {
      return reject("INVALID_AMOUNT", command);
    }
    if (this._history.has(command.tx)) {
      return reject("DUPLICATE_TRANSACTION", command);
    }

    const account = this._accounts.find(command.client);
    if (account === undefined) {
      return reject("MISSING_ACCOUNT", command);
    }
    if (account.frozen) {
      return reject("FROZEN_ACCOUNT", command);
    }
    if (compareMoney(account.available, amount) < 0) {
      return reject("INSUFFICIENT_FUNDS", command);
    }

    account.available = subtractMoney(account.available, amount);
    this._history.record({ id: command.tx, kind: "withdrawal", clientId: command.client, amount });
    return OK;
  }

  private _dispute(command: ClaimCommand): ApplyResult {
    const view = this._claimed(command);
    if (view === undefined) {
      return reject("INVALID_TRANSACTION", command);
    }
    if (view.status === "charged_back") {
      return reject("DISPUTE_CHARGEBACK", command);
    }
    if (view.status === "disputed") {
      return reject("DUPLICATE_TRANSACTION", command);
    }
    const account = this._accounts.find(view.transaction.clientId);
    if (account === undefined) {
      return reject("MISSING_ACCOUNT", command);
    }

    const hold = disputedHold(view.transaction);
    account.available = subtractMoney(account.available, hold);
    account.held = addMoney(account.held, hold);
    this._history.transition(command.tx, "disputed");
    return OK;
  }

  private _resolve(command: ClaimCommand): ApplyResult {
    const view = this._claimed(command);
    if (view === undefined || view.status !== "disputed") {
      return reject("INVALID_TRANSACTION", command);
    }
    const account = this._accounts.find(view.transaction.clientId);
    if (account === undefined) {
      return reject("MISSING_ACCOUNT", command);
    }

    const hold = disputedHold(view.transaction);
    account.available = addMoney(account.available, hold);
    account.held = subtractMoney(account.held, hold);
    this._history.transition(command.tx, "normal");
    return OK;
  }

  private _chargeback(command: ClaimCommand): ApplyResult {
    const view = this._claimed(command);
    if (view === undefined) {
      return reject("INVALID_TRANSACTION", command);
    }
    if (view.status === "charged_back") {
      return reject("DUPLICATE_TRANSACTION", command);
    }
    if (view.status !== "disputed") {
      return reject("INVALID_TRANSACTION", command);
    }
    const account = this._accounts.find(view.transaction.clientId);
    if (account === undefined) {
      return reject("MISSING_ACCOUNT", command);
    }

    // Same sign for both kinds: held drops by the original amount.
    account.held = subtractMoney(account.held, view.transaction.amount);
    account.frozen = true;
    this._history.transition(command.tx, "charged_back");
    return OK;
  }

  /**
   * The recorded transaction a claim refers to, if it exists and
   * belongs to the claiming client.
   */
  private _claimed(command: ClaimCommand): TransactionView | undefined {
    const view = this._history.get(command.tx);
    if (view === undefined || view.transaction.clientId !== command.client) {
      return undefined;
    }
    return view;
  }

  /**
   * Rescale an incoming amount to ledger precision.
   * Returns undefined when it is malformed, too precise, or not positive.
   */
  private _acceptAmount(amount: Money): Money | undefined {
    let rescaled: Money;
    try {
      rescaled = rescaleMoney(amount, this._decimals);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return undefined;
      }
      throw err;
    }
    return isPositive(rescaled) ? rescaled : undefined;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getAccount(clientId: ClientId): ClientAccount | undefined {
    return this._accounts.get(clientId);
  }

  /**
   * All accounts in creation order. Use snapshot() for reporting order.
   */
  getAccounts(): readonly ClientAccount[] {
    return this._accounts.getAll();
  }

  getTransaction(id: TransactionId): TransactionView | undefined {
    return this._history.get(id);
  }

  get accountCount(): number {
    return this._accounts.count;
  }

  get transactionCount(): number {
    return this._history.count;
  }

  /**
   * Reporting rows: every account, ascending by client,
   * balances rounded to `displayDecimals`.
   */
  snapshot(displayDecimals: number = DISPLAY_DECIMALS): readonly AccountSnapshotRow[] {
    return extractSnapshot(this._accounts.getAll(), displayDecimals);
  }
}

// ─── Failure Messages ────────────────────────────────────────────────────

/**
 * Human-readable message for a rejected command.
 */
export function describeFailure(failure: EngineFailure): string {
  const tx = String(failure.tx);
  const client = String(failure.client);
  switch (failure.code) {
    case "INVALID_AMOUNT":
      return `amount of transaction ${tx} must be greater than 0`;
    case "DUPLICATE_TRANSACTION":
      return `transaction ${tx} already processed`;
    case "INSUFFICIENT_FUNDS":
      return `insufficient funds for transaction ${tx} on client ${client}`;
    case "MISSING_ACCOUNT":
      return `no account for client ${client}`;
    case "INVALID_TRANSACTION":
      return `transaction ${tx} is not valid for client ${client} in its current state`;
    case "DISPUTE_CHARGEBACK":
      return `transaction ${tx} was charged back and cannot be disputed`;
    case "FROZEN_ACCOUNT":
      return `account for client ${client} is frozen`;
  }
}
