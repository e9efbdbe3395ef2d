/**
 * @payledger/types — Shared domain types for the payledger stack.
 *
 * These types are used across all payledger packages:
 * - Fixed-point amounts
 * - Transaction records (funds movements and dispute actions)
 * - Per-client balance snapshots
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type { Amount } from "./financial.js";

// Transaction types
export type {
  ClientId,
  TransactionId,
  FundsKind,
  DisputeActionKind,
  TransactionKind,
  FundsRecord,
  DisputeActionRecord,
  TransactionRecord,
  ClientSnapshot,
} from "./transaction.js";

// Runtime type guards
export {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  isClientId,
  isTransactionId,
  isFundsKind,
  isDisputeActionKind,
  isTransactionKind,
  carriesAmount,
} from "./guards.js";
