/**
 * Tests for the snapshot CSV writer.
 */

import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import type { ClientSnapshot } from "@payledger/types";
import { CsvSnapshotSink, formatSnapshotRow, formatSnapshots } from "../src/snapshot-sink.js";

const LOCKED: ClientSnapshot = {
  client: 1,
  available: { scaled: 75_000n },
  held: { scaled: 0n },
  total: { scaled: 75_000n },
  locked: true,
};

const DISPUTED: ClientSnapshot = {
  client: 2,
  available: { scaled: 12_345n },
  held: { scaled: 5_000n },
  total: { scaled: 17_345n },
  locked: false,
};

class MemoryWritable extends Writable {
  public text = "";

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString("utf8");
    callback();
  }
}

describe("formatSnapshotRow", () => {
  it("renders amounts and the lock flag", () => {
    expect(formatSnapshotRow(LOCKED)).toBe("1,7.5,0.0,7.5,true");
    expect(formatSnapshotRow(DISPUTED)).toBe("2,1.2345,0.5,1.7345,false");
  });
});

describe("formatSnapshots", () => {
  it("writes the header even with no clients", () => {
    expect(formatSnapshots([])).toBe("client,available,held,total,locked\n");
  });
});

describe("CsvSnapshotSink", () => {
  it("writes the header and one row per client", async () => {
    const out = new MemoryWritable();
    await new CsvSnapshotSink(out).write([LOCKED, DISPUTED]);

    expect(out.text).toBe("client,available,held,total,locked\n1,7.5,0.0,7.5,true\n2,1.2345,0.5,1.7345,false\n");
  });

  it("rejects when the stream fails", async () => {
    const out = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    out.on("error", () => undefined);

    await expect(new CsvSnapshotSink(out).write([LOCKED])).rejects.toThrow("EPIPE");
  });
});
