/**
 * @payledger/csv — Snapshot writer.
 *
 * Renders client snapshots as `client,available,held,total,locked` CSV.
 */

import type { Writable } from "node:stream";
import type { ClientSnapshot } from "@payledger/types";
import { formatAmount } from "@payledger/ledger";

export const SNAPSHOT_HEADER = "client,available,held,total,locked";

export function formatSnapshotRow(snapshot: ClientSnapshot): string {
  return [
    String(snapshot.client),
    formatAmount(snapshot.available),
    formatAmount(snapshot.held),
    formatAmount(snapshot.total),
    String(snapshot.locked),
  ].join(",");
}

/**
 * Header plus one row per snapshot, newline-terminated.
 */
export function formatSnapshots(snapshots: readonly ClientSnapshot[]): string {
  const lines = [SNAPSHOT_HEADER, ...snapshots.map(formatSnapshotRow)];
  return lines.join("\n") + "\n";
}

/**
 * Writes the whole snapshot set in one chunk, so a failed run never
 * leaves a partial table behind.
 */
export class CsvSnapshotSink {
  private readonly _out: Writable;

  constructor(out: Writable) {
    this._out = out;
  }

  write(snapshots: readonly ClientSnapshot[]): Promise<void> {
    const text = formatSnapshots(snapshots);
    return new Promise((resolve, reject) => {
      this._out.write(text, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
