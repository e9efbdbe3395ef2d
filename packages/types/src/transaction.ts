/**
 * Transaction Types
 *
 * The validated input records and the per-client output snapshot.
 *
 * Rules:
 * - Only deposits and withdrawals carry an amount
 * - Dispute actions reference an earlier deposit/withdrawal by tx id
 * - Records are produced by a decoder and never mutated afterwards
 */

import type { Amount } from "./financial.js";

/** Client identifier (unsigned 16-bit range). */
export type ClientId = number;

/** Transaction identifier (unsigned 32-bit range). */
export type TransactionId = number;

/** Kinds that move money and are retained for later disputes. */
export type FundsKind = "deposit" | "withdrawal";

/** Kinds that act on a previously applied deposit/withdrawal. */
export type DisputeActionKind = "dispute" | "resolve" | "chargeback";

export type TransactionKind = FundsKind | DisputeActionKind;

/**
 * A deposit or withdrawal. `txId` is unique among funds records.
 */
export interface FundsRecord {
  readonly kind: FundsKind;
  readonly clientId: ClientId;
  readonly txId: TransactionId;
  readonly amount: Amount;
}

/**
 * A dispute, resolve or chargeback. `txId` names the funds record it acts on,
 * which must belong to the same client.
 */
export interface DisputeActionRecord {
  readonly kind: DisputeActionKind;
  readonly clientId: ClientId;
  readonly txId: TransactionId;
}

/** A validated transaction, ready to be applied to a ledger. */
export type TransactionRecord = FundsRecord | DisputeActionRecord;

/**
 * Final balance state for one client.
 * `total` is always `available + held`.
 */
export interface ClientSnapshot {
  readonly client: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  readonly total: Amount;
  readonly locked: boolean;
}
