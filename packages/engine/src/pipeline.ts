/**
 * @payledger/engine — Run pipeline.
 *
 * Wires a TransactionSource through a PaymentEngine into a SnapshotSink.
 *
 * Rules:
 * - Records are handed to the engine in source order
 * - The sink is written exactly once, and only after finalize() succeeds
 * - Any failure (source, engine, sink) propagates; the engine is always disposed
 */

import type { LedgerStore } from "@payledger/ledger";
import { SerialEngine } from "./serial-engine.js";
import { StreamEngine } from "./stream-engine.js";
import type {
  EngineKind,
  EngineOptions,
  PaymentEngine,
  RunSummary,
  SnapshotSink,
  TransactionSource,
} from "./types.js";

/**
 * Construct the engine of the requested kind over the given store.
 */
export function createEngine(
  kind: EngineKind,
  store: LedgerStore,
  options: EngineOptions = {},
): PaymentEngine {
  switch (kind) {
    case "serial":
      return new SerialEngine(store, options);
    case "stream":
      return new StreamEngine(store, options);
  }
}

/**
 * Drain the source into the engine, then write the final snapshots.
 */
export async function runEngine(
  engine: PaymentEngine,
  source: TransactionSource,
  sink: SnapshotSink,
): Promise<RunSummary> {
  try {
    for await (const record of source) {
      engine.process(record);
    }

    const snapshots = await engine.finalize();
    await sink.write(snapshots);

    return {
      engine: engine.kind,
      transactions: engine.transactionCount,
      clients: snapshots.length,
    };
  } finally {
    await engine.dispose();
  }
}
