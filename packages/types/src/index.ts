/**
 * @tally/types: shared domain types for the tally stack.
 *
 * These types are used across all tally packages:
 * - Financial primitives (Money, client and transaction ids)
 * - Transaction lifecycle
 * - Commands submitted to the ledger engine
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  ClientId,
  TransactionId,
  RecordedKind,
  TransactionStatus,
} from "./financial.js";

export { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./financial.js";

// Command types
export type {
  Command,
  CommandType,
  FundsCommand,
  ClaimCommand,
} from "./command.js";

// Runtime type guards
export {
  isMoney,
  isClientId,
  isTransactionId,
  isRecordedKind,
  isCommandType,
  isCommand,
} from "./guards.js";
