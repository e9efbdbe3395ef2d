/**
 * Runtime type guard tests for @payledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isClientId,
  isTransactionId,
  isFundsKind,
  isDisputeActionKind,
  isTransactionKind,
  carriesAmount,
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
} from "../src/guards.js";
import type { TransactionRecord } from "../src/transaction.js";

// =============================================================================
// Identifier guards
// =============================================================================

describe("isClientId", () => {
  it("accepts the full unsigned 16-bit range", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(1)).toBe(true);
    expect(isClientId(MAX_CLIENT_ID)).toBe(true);
  });

  it("rejects values outside the range", () => {
    expect(isClientId(-1)).toBe(false);
    expect(isClientId(65536)).toBe(false);
  });

  it("rejects non-integers and non-numbers", () => {
    expect(isClientId(1.5)).toBe(false);
    expect(isClientId("1")).toBe(false);
    expect(isClientId(null)).toBe(false);
    expect(isClientId(Number.NaN)).toBe(false);
  });
});

describe("isTransactionId", () => {
  it("accepts the full unsigned 32-bit range", () => {
    expect(isTransactionId(0)).toBe(true);
    expect(isTransactionId(MAX_TRANSACTION_ID)).toBe(true);
  });

  it("rejects values outside the range", () => {
    expect(isTransactionId(-1)).toBe(false);
    expect(isTransactionId(4_294_967_296)).toBe(false);
  });

  it("rejects non-integers", () => {
    expect(isTransactionId(2.25)).toBe(false);
    expect(isTransactionId("7")).toBe(false);
  });
});

// =============================================================================
// Kind guards
// =============================================================================

describe("kind guards", () => {
  it("separates funds kinds from dispute actions", () => {
    expect(isFundsKind("deposit")).toBe(true);
    expect(isFundsKind("withdrawal")).toBe(true);
    expect(isFundsKind("dispute")).toBe(false);

    expect(isDisputeActionKind("dispute")).toBe(true);
    expect(isDisputeActionKind("resolve")).toBe(true);
    expect(isDisputeActionKind("chargeback")).toBe(true);
    expect(isDisputeActionKind("deposit")).toBe(false);
  });

  it("isTransactionKind accepts all five kinds", () => {
    for (const kind of ["deposit", "withdrawal", "dispute", "resolve", "chargeback"]) {
      expect(isTransactionKind(kind)).toBe(true);
    }
  });

  it("isTransactionKind is case sensitive", () => {
    expect(isTransactionKind("Deposit")).toBe(false);
    expect(isTransactionKind("transfer")).toBe(false);
    expect(isTransactionKind(undefined)).toBe(false);
  });
});

// =============================================================================
// Record guards
// =============================================================================

describe("carriesAmount", () => {
  it("narrows deposits and withdrawals only", () => {
    const deposit: TransactionRecord = {
      kind: "deposit",
      clientId: 3,
      txId: 9,
      amount: { scaled: 50_000n },
    };
    const resolve: TransactionRecord = { kind: "resolve", clientId: 3, txId: 9 };

    expect(carriesAmount(deposit)).toBe(true);
    expect(carriesAmount(resolve)).toBe(false);
    if (carriesAmount(deposit)) {
      expect(deposit.amount.scaled).toBe(50_000n);
    }
  });
});
