/**
 * @payledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @payledger/types with ledger-specific
 * structures: dispute bookkeeping, apply outcomes and errors.
 *
 * Rules:
 * - All types are readonly
 * - Semantic failures are returned as outcomes, never thrown
 * - Fatal failures (bad input, overflow) are always thrown
 */

import type { Amount, FundsKind } from "@payledger/types";

// ─── Dispute Ledger ──────────────────────────────────────────────────────

/**
 * Dispute lifecycle of a retained deposit/withdrawal.
 *
 * none → disputed → resolved | charged_back
 * A resolved entry may be disputed again; charged_back is terminal.
 */
export type DisputeState = "none" | "disputed" | "resolved" | "charged_back";

/**
 * A deposit or withdrawal remembered for later dispute actions.
 * Entries are replaced (never edited) on every state transition.
 */
export interface DisputeEntry {
  readonly kind: FundsKind;
  readonly amount: Amount;
  readonly state: DisputeState;
}

// ─── Apply Outcomes ──────────────────────────────────────────────────────

/** Why a transaction was dropped without touching the ledger. */
export type RejectionReason =
  | "ACCOUNT_LOCKED"
  | "CLIENT_MISMATCH"
  | "INSUFFICIENT_FUNDS"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "ALREADY_DISPUTED"
  | "ALREADY_CHARGED_BACK"
  | "NOT_DISPUTED";

export type ApplyOutcome =
  | { readonly applied: true }
  | { readonly applied: false; readonly reason: RejectionReason };

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for rejected input. */
export type ParseErrorCode =
  | "INVALID_AMOUNT"
  | "PRECISION_EXCEEDED"
  | "OVERFLOW"
  | "NEGATIVE_AMOUNT"
  | "MISSING_AMOUNT"
  | "INVALID_TYPE"
  | "INVALID_CLIENT_ID"
  | "INVALID_TX_ID"
  | "INVALID_HEADER"
  | "MALFORMED_ROW";

/**
 * Input that cannot become a valid amount or transaction record.
 * Fatal: the run aborts and no snapshot is written.
 */
export class ParseError extends Error {
  public readonly code: ParseErrorCode;
  /** 1-based data line of the offending row, when known. */
  public readonly line: number | undefined;

  constructor(code: ParseErrorCode, message: string, line?: number) {
    super(line === undefined ? message : `Line ${String(line)}: ${message}`);
    this.name = "ParseError";
    this.code = code;
    this.line = line;
  }
}

/** Arithmetic operations guarded against 64-bit overflow. */
export type AmountOperation = "add" | "subtract";

/**
 * A balance update left the signed 64-bit scaled range.
 * Fatal: never treated as a skipped transaction.
 */
export class ArithmeticOverflowError extends Error {
  public readonly code = "ARITHMETIC_OVERFLOW" as const;
  public readonly operation: AmountOperation;

  constructor(operation: AmountOperation, message: string) {
    super(message);
    this.name = "ArithmeticOverflowError";
    this.operation = operation;
  }
}
