/**
 * @payledger/engine — Streaming engine.
 *
 * Partitions the input by client ID. The dispatcher (process()) forwards
 * each record to the mailbox of the worker owning that client; each worker
 * is an async task that drains its mailbox in order against the one
 * AccountLedger it owns.
 *
 * Concurrency model:
 * - One worker per distinct client, spawned on first sight, alive until finalize()
 * - Forwarding never blocks (unbounded mailboxes)
 * - Per-client order is preserved; cross-client order is unspecified
 * - No locking: no two workers ever touch the same ledger
 *
 * A worker that throws (e.g. ArithmeticOverflowError) records the failure
 * on the engine, discards its mailbox and stops. From then on process()
 * throws WORKER_FAILED so the dispatcher stops reading input. Siblings
 * drain what they already hold; finalize() rejects with every failure and
 * no snapshot is produced.
 */

import type { ClientId, ClientSnapshot, TransactionRecord } from "@payledger/types";
import type { AccountLedger, LedgerStore } from "@payledger/ledger";
import { Mailbox } from "./mailbox.js";
import type { EngineEvent, EngineOptions, PaymentEngine, WorkerFailure } from "./types.js";
import { EngineError } from "./types.js";

type WorkerResult =
  | { readonly ok: true; readonly processed: number }
  | { readonly ok: false; readonly failure: WorkerFailure };

interface ClientWorker {
  readonly clientId: ClientId;
  readonly mailbox: Mailbox<TransactionRecord>;
  readonly done: Promise<WorkerResult>;
}

function workerFailedError(failures: readonly WorkerFailure[]): EngineError {
  const clients = failures.map((f) => String(f.clientId)).join(", ");
  return new EngineError(
    "WORKER_FAILED",
    `${String(failures.length)} client worker(s) failed: ${clients}`,
    [...failures],
  );
}

export class StreamEngine implements PaymentEngine {
  public readonly kind = "stream" as const;
  private readonly _store: LedgerStore;
  private readonly _onEvent: (event: EngineEvent) => void;
  private readonly _workers: Map<ClientId, ClientWorker> = new Map();
  private readonly _failures: WorkerFailure[] = [];
  private _count = 0;
  private _finalized = false;

  constructor(store: LedgerStore, options: EngineOptions = {}) {
    this._store = store;
    this._onEvent = options.onEvent ?? (() => {});
  }

  get transactionCount(): number {
    return this._count;
  }

  /**
   * Number of client workers spawned so far.
   */
  get workerCount(): number {
    return this._workers.size;
  }

  /**
   * Workers that have failed so far, in failure order.
   */
  get failures(): readonly WorkerFailure[] {
    return this._failures;
  }

  // ─── Dispatcher ──────────────────────────────────────────────────────

  process(record: TransactionRecord): void {
    if (this._finalized) {
      throw new EngineError("ENGINE_FINALIZED", "Cannot process transactions after finalize()");
    }
    if (this._failures.length > 0) {
      throw workerFailedError(this._failures);
    }

    this._count++;
    this._workerFor(record.clientId).mailbox.post(record);
  }

  private _workerFor(clientId: ClientId): ClientWorker {
    const existing = this._workers.get(clientId);
    if (existing !== undefined) {
      return existing;
    }

    // The worker takes exclusive ownership of this ledger for the run.
    const ledger = this._store.getOrCreate(clientId);
    const mailbox = new Mailbox<TransactionRecord>();
    const worker: ClientWorker = {
      clientId,
      mailbox,
      done: this._drain(ledger, mailbox),
    };

    this._workers.set(clientId, worker);
    this._onEvent({ type: "worker_spawned", clientId });
    return worker;
  }

  // ─── Worker ──────────────────────────────────────────────────────────

  private async _drain(
    ledger: AccountLedger,
    mailbox: Mailbox<TransactionRecord>,
  ): Promise<WorkerResult> {
    let processed = 0;

    try {
      for await (const record of mailbox) {
        const outcome = ledger.apply(record);
        processed++;
        if (!outcome.applied) {
          this._onEvent({
            type: "transaction_rejected",
            engine: this.kind,
            record,
            reason: outcome.reason,
          });
        }
      }
    } catch (err: unknown) {
      const failure: WorkerFailure = { clientId: ledger.clientId, error: err };
      this._failures.push(failure);
      mailbox.discard();
      this._onEvent({ type: "worker_failed", clientId: ledger.clientId, error: err });
      return { ok: false, failure };
    }

    return { ok: true, processed };
  }

  // ─── Finalization ────────────────────────────────────────────────────

  /**
   * Close every mailbox, wait for all workers to drain, then read the
   * aggregate snapshot from the store.
   */
  async finalize(): Promise<readonly ClientSnapshot[]> {
    const results = await this._shutdown();

    const failures: WorkerFailure[] = [];
    for (const result of results) {
      if (!result.ok) {
        failures.push(result.failure);
      }
    }

    if (failures.length > 0) {
      throw workerFailedError(failures);
    }

    return this._store.snapshots();
  }

  async dispose(): Promise<void> {
    await this._shutdown();
  }

  private _shutdown(): Promise<WorkerResult[]> {
    this._finalized = true;

    const workers = [...this._workers.values()].sort((a, b) => a.clientId - b.clientId);
    for (const worker of workers) {
      worker.mailbox.close();
    }
    return Promise.all(workers.map((w) => w.done));
  }
}
