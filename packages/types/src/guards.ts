/**
 * Runtime Type Guards
 *
 * Narrowing functions for payledger domain types.
 * Used at system boundaries (decoded CSV rows) and to
 * discriminate transaction records.
 */

import type {
  ClientId,
  DisputeActionKind,
  FundsKind,
  FundsRecord,
  TransactionId,
  TransactionKind,
  TransactionRecord,
} from "./transaction.js";

// =============================================================================
// Identifier guards
// =============================================================================

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TRANSACTION_ID = 0xffff_ffff;

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

// =============================================================================
// Kind guards
// =============================================================================

const FUNDS_KINDS = new Set<string>(["deposit", "withdrawal"]);
const DISPUTE_ACTION_KINDS = new Set<string>(["dispute", "resolve", "chargeback"]);

export function isFundsKind(value: unknown): value is FundsKind {
  return typeof value === "string" && FUNDS_KINDS.has(value);
}

export function isDisputeActionKind(value: unknown): value is DisputeActionKind {
  return typeof value === "string" && DISPUTE_ACTION_KINDS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return isFundsKind(value) || isDisputeActionKind(value);
}

// =============================================================================
// Record guards
// =============================================================================

/** Narrow a record to a deposit/withdrawal. */
export function carriesAmount(record: TransactionRecord): record is FundsRecord {
  return isFundsKind(record.kind);
}
