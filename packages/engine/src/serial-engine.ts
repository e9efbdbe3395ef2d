/**
 * @payledger/engine — Serial engine.
 *
 * Applies each record to the LedgerStore immediately, on the caller's
 * turn, in arrival order. No concurrency.
 */

import type { ClientSnapshot, TransactionRecord } from "@payledger/types";
import type { LedgerStore } from "@payledger/ledger";
import type { EngineEvent, EngineOptions, PaymentEngine } from "./types.js";
import { EngineError } from "./types.js";

/**
 * Synchronous engine. Deterministic: identical input always yields an
 * identical store. ArithmeticOverflowError from a ledger propagates out
 * of process() and aborts the run.
 */
export class SerialEngine implements PaymentEngine {
  public readonly kind = "serial" as const;
  private readonly _store: LedgerStore;
  private readonly _onEvent: (event: EngineEvent) => void;
  private _count = 0;
  private _finalized = false;

  constructor(store: LedgerStore, options: EngineOptions = {}) {
    this._store = store;
    this._onEvent = options.onEvent ?? (() => {});
  }

  get transactionCount(): number {
    return this._count;
  }

  process(record: TransactionRecord): void {
    if (this._finalized) {
      throw new EngineError("ENGINE_FINALIZED", "Cannot process transactions after finalize()");
    }

    this._count++;
    const outcome = this._store.getOrCreate(record.clientId).apply(record);
    if (!outcome.applied) {
      this._onEvent({
        type: "transaction_rejected",
        engine: this.kind,
        record,
        reason: outcome.reason,
      });
    }
  }

  async finalize(): Promise<readonly ClientSnapshot[]> {
    this._finalized = true;
    return this._store.snapshots();
  }

  async dispose(): Promise<void> {
    this._finalized = true;
  }
}
