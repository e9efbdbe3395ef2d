/**
 * @payledger/engine — Transaction processing engines.
 *
 * Two interchangeable engines over a LedgerStore:
 * - SerialEngine: applies every record in arrival order on the caller's turn
 * - StreamEngine: one async worker per client, fed by a dispatcher
 *
 * For the same input both produce identical per-client snapshots.
 */

// Engines
export { SerialEngine } from "./serial-engine.js";
export { StreamEngine } from "./stream-engine.js";
export { Mailbox, MailboxClosedError } from "./mailbox.js";

// Pipeline
export { createEngine, runEngine } from "./pipeline.js";

// Types
export type {
  EngineKind,
  PaymentEngine,
  TransactionSource,
  SnapshotSink,
  EngineEvent,
  EngineOptions,
  RunSummary,
  EngineErrorCode,
  WorkerFailure,
} from "./types.js";

export { EngineError } from "./types.js";
