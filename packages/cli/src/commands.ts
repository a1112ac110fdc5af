/**
 * @tally/cli: record → command conversion.
 *
 * The last gate before the ledger. Deposits and withdrawals must carry
 * a positive amount that fits the ledger precision; anything else is
 * rejected here and never applied. Claim records ignore any amount.
 */

import type { Command, Money } from "@tally/types";
import { LedgerError, isPositive, toMoney } from "@tally/ledger";
import type { TransactionRecord } from "./ingest.js";

export type CommandErrorCode = "MISSING_AMOUNT" | "INVALID_AMOUNT" | "NON_POSITIVE_AMOUNT";

export interface CommandError {
  readonly code: CommandErrorCode;
  readonly message: string;
}

export type CommandResult =
  | { readonly ok: true; readonly command: Command }
  | { readonly ok: false; readonly error: CommandError };

function fail(code: CommandErrorCode, message: string): CommandResult {
  return { ok: false, error: { code, message } };
}

export function toCommand(record: TransactionRecord, decimals: number): CommandResult {
  const { type, client, tx } = record;

  if (type === "dispute" || type === "resolve" || type === "chargeback") {
    return { ok: true, command: { type, client, tx } };
  }

  if (record.amount === undefined) {
    return fail("MISSING_AMOUNT", `${type} ${String(tx)} has no amount`);
  }

  let amount: Money;
  try {
    amount = toMoney(record.amount, decimals);
  } catch (err: unknown) {
    if (err instanceof LedgerError) {
      return fail("INVALID_AMOUNT", err.message);
    }
    throw err;
  }

  if (!isPositive(amount)) {
    return fail("NON_POSITIVE_AMOUNT", `${type} ${String(tx)} amount must be greater than 0, got "${record.amount}"`);
  }

  return { ok: true, command: { type, client, tx, amount } };
}
