/**
 * Property-Based Tests: serial and stream engines agree.
 *
 * For any multi-client input, both engines produce identical final
 * per-client (available, held, total, locked) tuples.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { ClientSnapshot, TransactionKind, TransactionRecord } from "@payledger/types";
import { LedgerStore } from "@payledger/ledger";
import { SerialEngine } from "../src/serial-engine.js";
import { StreamEngine } from "../src/stream-engine.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbKind: fc.Arbitrary<TransactionKind> = fc.constantFrom(
  "deposit",
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
);

/** Few clients and tx IDs so references and cross-client collisions are common. */
const arbRecord: fc.Arbitrary<TransactionRecord> = fc
  .tuple(
    arbKind,
    fc.integer({ min: 1, max: 4 }),
    fc.integer({ min: 1, max: 10 }),
    fc.bigInt({ min: 1n, max: 5_000_000n }),
  )
  .map(([kind, clientId, txId, scaled]): TransactionRecord => {
    if (kind === "deposit" || kind === "withdrawal") {
      return { kind, clientId, txId, amount: { scaled } };
    }
    return { kind, clientId, txId };
  });

async function runBoth(
  records: readonly TransactionRecord[],
): Promise<{ serial: readonly ClientSnapshot[]; stream: readonly ClientSnapshot[] }> {
  const serial = new SerialEngine(new LedgerStore());
  const stream = new StreamEngine(new LedgerStore());
  for (const record of records) {
    serial.process(record);
    stream.process(record);
  }
  return { serial: await serial.finalize(), stream: await stream.finalize() };
}

// =============================================================================
// Properties
// =============================================================================

describe("serial/stream equivalence", () => {
  it("produces identical snapshots for any input", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbRecord, { maxLength: 120 }), async (records) => {
        const { serial, stream } = await runBoth(records);
        expect(stream).toEqual(serial);
      }),
      { numRuns: 200 },
    );
  });

  it("produces one snapshot per distinct client", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbRecord, { maxLength: 60 }), async (records) => {
        const { stream } = await runBoth(records);
        const clients = [...new Set(records.map((r) => r.clientId))].sort((a, b) => a - b);
        expect(stream.map((s) => s.client)).toEqual(clients);
      }),
    );
  });

  it("keeps total equal to available plus held", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbRecord, { maxLength: 60 }), async (records) => {
        const { stream } = await runBoth(records);
        for (const snapshot of stream) {
          expect(snapshot.total.scaled).toBe(snapshot.available.scaled + snapshot.held.scaled);
        }
      }),
    );
  });
});
