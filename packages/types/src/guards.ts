/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * The ledger checks every command it is handed with isCommand.
 */

import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
} from "./financial.js";
import type {
  ClientId,
  Money,
  RecordedKind,
  TransactionId,
} from "./financial.js";
import type { Command, CommandType } from "./command.js";

// =============================================================================
// Financial guards
// =============================================================================

const RECORDED_KINDS = new Set<string>(["deposit", "withdrawal"]);

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTransactionId(value: unknown): value is TransactionId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TRANSACTION_ID
  );
}

export function isRecordedKind(value: unknown): value is RecordedKind {
  return typeof value === "string" && RECORDED_KINDS.has(value);
}

// =============================================================================
// Command guards
// =============================================================================

const COMMAND_TYPES = new Set<string>([
  "deposit", "withdrawal", "dispute", "resolve", "chargeback",
]);

export function isCommandType(value: unknown): value is CommandType {
  return typeof value === "string" && COMMAND_TYPES.has(value);
}

export function isCommand(value: unknown): value is Command {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isCommandType(v.type) || !isClientId(v.client) || !isTransactionId(v.tx)) {
    return false;
  }
  if (isRecordedKind(v.type)) {
    return isMoney(v.amount);
  }
  return true;
}
