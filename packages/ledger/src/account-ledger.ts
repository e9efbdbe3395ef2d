/**
 * @payledger/ledger — Per-client account ledger.
 *
 * Holds one client's balances and the dispute history of every
 * deposit/withdrawal applied to it, and applies transactions through
 * the dispute state machine.
 *
 * Effects for a referenced deposit of amount a:
 * - dispute:    available -= a, held += a
 * - resolve:    held -= a, available += a
 * - chargeback: held -= a, account locked
 *
 * Effects for a referenced withdrawal of amount a:
 * - dispute:    held += a (the contested reversal is held, not spendable)
 * - resolve:    held -= a (the withdrawal stands)
 * - chargeback: held -= a, available += a, account locked
 *
 * Rules:
 * - total is always derived (available + held), never stored
 * - A locked account rejects every later transaction
 * - Failed preconditions leave the ledger untouched
 * - Arithmetic overflow throws and is never swallowed
 */

import type {
  Amount,
  ClientId,
  ClientSnapshot,
  DisputeActionRecord,
  FundsRecord,
  TransactionId,
  TransactionRecord,
} from "@payledger/types";
import { carriesAmount } from "@payledger/types";
import {
  addAmounts,
  isSufficient,
  subtractAmounts,
  ZERO_AMOUNT,
} from "./money-math.js";
import type { ApplyOutcome, DisputeEntry, RejectionReason } from "./types.js";

const APPLIED: ApplyOutcome = { applied: true };

function rejected(reason: RejectionReason): ApplyOutcome {
  return { applied: false, reason };
}

/**
 * Balance state and dispute ledger for a single client.
 *
 * Owned by a LedgerStore. Exactly one caller (the serial engine, or the
 * stream worker for this client) applies transactions to it.
 */
export class AccountLedger {
  public readonly clientId: ClientId;
  private _available: Amount = ZERO_AMOUNT;
  private _held: Amount = ZERO_AMOUNT;
  private _locked = false;
  private readonly _entries: Map<TransactionId, DisputeEntry> = new Map();

  constructor(clientId: ClientId) {
    this.clientId = clientId;
  }

  // ─── Balances ────────────────────────────────────────────────────────

  get available(): Amount {
    return this._available;
  }

  get held(): Amount {
    return this._held;
  }

  /**
   * available + held. Throws ArithmeticOverflowError if the sum overflows.
   */
  get total(): Amount {
    return addAmounts(this._available, this._held);
  }

  get locked(): boolean {
    return this._locked;
  }

  // ─── Dispute Ledger ──────────────────────────────────────────────────

  /**
   * Get the retained deposit/withdrawal for a transaction ID.
   */
  getEntry(txId: TransactionId): DisputeEntry | undefined {
    return this._entries.get(txId);
  }

  /**
   * Number of deposits/withdrawals retained for disputes.
   */
  get entryCount(): number {
    return this._entries.size;
  }

  // ─── Apply ───────────────────────────────────────────────────────────

  /**
   * Apply one transaction.
   *
   * Returns `{ applied: false, reason }` for every semantic failure
   * (locked account, insufficient funds, unknown reference, wrong
   * dispute state). Throws ArithmeticOverflowError on overflow.
   */
  apply(record: TransactionRecord): ApplyOutcome {
    if (record.clientId !== this.clientId) {
      return rejected("CLIENT_MISMATCH");
    }
    if (this._locked) {
      return rejected("ACCOUNT_LOCKED");
    }

    if (carriesAmount(record)) {
      return record.kind === "deposit"
        ? this._deposit(record)
        : this._withdraw(record);
    }

    switch (record.kind) {
      case "dispute":
        return this._dispute(record);
      case "resolve":
        return this._resolve(record);
      case "chargeback":
        return this._chargeback(record);
    }
  }

  private _deposit(record: FundsRecord): ApplyOutcome {
    if (this._entries.has(record.txId)) {
      return rejected("DUPLICATE_TRANSACTION");
    }

    this._available = addAmounts(this._available, record.amount);
    this._retain(record);
    return APPLIED;
  }

  private _withdraw(record: FundsRecord): ApplyOutcome {
    if (this._entries.has(record.txId)) {
      return rejected("DUPLICATE_TRANSACTION");
    }
    if (!isSufficient(this._available, record.amount)) {
      return rejected("INSUFFICIENT_FUNDS");
    }

    this._available = subtractAmounts(this._available, record.amount);
    this._retain(record);
    return APPLIED;
  }

  private _dispute(record: DisputeActionRecord): ApplyOutcome {
    const entry = this._entries.get(record.txId);
    if (entry === undefined) {
      return rejected("UNKNOWN_TRANSACTION");
    }
    if (entry.state === "disputed") {
      return rejected("ALREADY_DISPUTED");
    }
    if (entry.state === "charged_back") {
      return rejected("ALREADY_CHARGED_BACK");
    }

    if (entry.kind === "deposit") {
      const available = subtractAmounts(this._available, entry.amount);
      const held = addAmounts(this._held, entry.amount);
      this._available = available;
      this._held = held;
    } else {
      this._held = addAmounts(this._held, entry.amount);
    }

    this._transition(record.txId, entry, "disputed");
    return APPLIED;
  }

  private _resolve(record: DisputeActionRecord): ApplyOutcome {
    const entry = this._entries.get(record.txId);
    if (entry === undefined) {
      return rejected("UNKNOWN_TRANSACTION");
    }
    if (entry.state !== "disputed") {
      return rejected("NOT_DISPUTED");
    }

    const held = subtractAmounts(this._held, entry.amount);
    if (entry.kind === "deposit") {
      this._available = addAmounts(this._available, entry.amount);
    }
    this._held = held;

    this._transition(record.txId, entry, "resolved");
    return APPLIED;
  }

  private _chargeback(record: DisputeActionRecord): ApplyOutcome {
    const entry = this._entries.get(record.txId);
    if (entry === undefined) {
      return rejected("UNKNOWN_TRANSACTION");
    }
    if (entry.state !== "disputed") {
      return rejected("NOT_DISPUTED");
    }

    const held = subtractAmounts(this._held, entry.amount);
    if (entry.kind === "withdrawal") {
      this._available = addAmounts(this._available, entry.amount);
    }
    this._held = held;
    this._locked = true;

    this._transition(record.txId, entry, "charged_back");
    return APPLIED;
  }

  private _retain(record: FundsRecord): void {
    this._entries.set(record.txId, {
      kind: record.kind,
      amount: record.amount,
      state: "none",
    });
  }

  private _transition(txId: TransactionId, entry: DisputeEntry, state: DisputeEntry["state"]): void {
    this._entries.set(txId, { ...entry, state });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Current balances as an output record.
   */
  snapshot(): ClientSnapshot {
    return {
      client: this.clientId,
      available: this._available,
      held: this._held,
      total: this.total,
      locked: this._locked,
    };
  }
}
