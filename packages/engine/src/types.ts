/**
 * @payledger/engine — Engine contracts.
 *
 * The boundary types every engine implements or consumes:
 * - PaymentEngine: accepts records in order, produces final snapshots
 * - TransactionSource / SnapshotSink: the collaborators at the edges
 * - EngineEvent: diagnostics reported through the onEvent callback
 */

import type { ClientId, ClientSnapshot, TransactionRecord } from "@payledger/types";
import type { RejectionReason } from "@payledger/ledger";

// ─── Engine Contract ─────────────────────────────────────────────────────

export type EngineKind = "serial" | "stream";

/**
 * Applies an ordered transaction stream to a LedgerStore.
 *
 * Both implementations produce identical snapshots for the same input.
 */
export interface PaymentEngine {
  readonly kind: EngineKind;
  /** Records accepted by process() so far. */
  readonly transactionCount: number;

  /**
   * Accept the next record in arrival order.
   * Throws EngineError after finalize(), and (stream engine) WORKER_FAILED
   * once any client worker has failed; the serial engine throws
   * ArithmeticOverflowError directly.
   */
  process(record: TransactionRecord): void;

  /**
   * Signal end of input, wait for all pending work, and return one
   * snapshot per client in ascending client ID order.
   */
  finalize(): Promise<readonly ClientSnapshot[]>;

  /**
   * Release any outstanding workers. Safe to call more than once and
   * after a failed run.
   */
  dispose(): Promise<void>;
}

// ─── Boundary Collaborators ──────────────────────────────────────────────

/** A finite, ordered, lazily produced sequence of validated records. */
export type TransactionSource = AsyncIterable<TransactionRecord> | Iterable<TransactionRecord>;

/** Consumer of the final per-client snapshots. */
export interface SnapshotSink {
  write(snapshots: readonly ClientSnapshot[]): Promise<void>;
}

// ─── Events ──────────────────────────────────────────────────────────────

export type EngineEvent =
  | {
      readonly type: "worker_spawned";
      readonly clientId: ClientId;
    }
  | {
      readonly type: "transaction_rejected";
      readonly engine: EngineKind;
      readonly record: TransactionRecord;
      readonly reason: RejectionReason;
    }
  | {
      readonly type: "worker_failed";
      readonly clientId: ClientId;
      readonly error: unknown;
    };

export interface EngineOptions {
  /** Receives diagnostics. Must not throw. */
  readonly onEvent?: ((event: EngineEvent) => void) | undefined;
}

/**
 * Result of a complete run through runEngine().
 */
export interface RunSummary {
  readonly engine: EngineKind;
  readonly transactions: number;
  readonly clients: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type EngineErrorCode = "ENGINE_FINALIZED" | "WORKER_FAILED";

/** A client worker that stopped before draining its mailbox. */
export interface WorkerFailure {
  readonly clientId: ClientId;
  readonly error: unknown;
}

/**
 * Structured error from an engine.
 * WORKER_FAILED carries every failed client; no snapshot is produced.
 */
export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly failures: readonly WorkerFailure[];

  constructor(code: EngineErrorCode, message: string, failures: readonly WorkerFailure[] = []) {
    super(message, failures[0] === undefined ? undefined : { cause: failures[0].error });
    this.name = "EngineError";
    this.code = code;
    this.failures = failures;
  }
}
