/**
 * Tests for a full CLI run against fixture files.
 */

import { describe, it, expect } from "vitest";
import { stripVTControlCharacters } from "node:util";
import type { EngineKind } from "@payledger/engine";
import { describeError, runCli } from "../src/run.js";
import { fixture, MemoryWritable, memoryLogger } from "./helpers.js";

function setup(engine: EngineKind, inputPath: string) {
  const stdout = new MemoryWritable();
  const stderr = new MemoryWritable();
  const log = memoryLogger("info");
  const run = () =>
    runCli({
      inputPath,
      config: { PAYLEDGER_ENGINE: engine },
      logger: log.logger,
      io: { stdout, stderr },
    });
  return { stdout, stderr, log, run };
}

const OVERFLOW = "Amount overflow on add: 922337203685477.5807 + 0.0001 is outside the 64-bit scaled range";

describe.each<EngineKind>(["serial", "stream"])("runCli with the %s engine", (engine) => {
  it("prints the final balances", async () => {
    const { stdout, stderr, run } = setup(engine, fixture("locked-withdrawal.csv"));

    const result = await run();

    expect(result).toEqual({ exitCode: 0, summary: { engine, transactions: 10, clients: 2 } });
    expect(stdout.text).toBe(
      "client,available,held,total,locked\n1,7.5,0.0,7.5,true\n2,9.0,0.0,9.0,false\n",
    );
    expect(stderr.text).toBe("");
  });

  it("logs rejections and the run summary", async () => {
    const { log, run } = setup(engine, fixture("locked-withdrawal.csv"));

    await run();

    const entries = log.entries();
    const messages = entries.map((e) => (typeof e === "object" && e !== null && "msg" in e ? e.msg : undefined));
    expect(messages.filter((m) => m === "Transaction rejected")).toHaveLength(4);
    expect(entries).toContainEqual(
      expect.objectContaining({ msg: "Run completed", engine, transactions: 10, clients: 2 }),
    );
  });

  it("writes nothing to stdout on a parse error", async () => {
    const { stdout, stderr, run } = setup(engine, fixture("precision.csv"));

    const result = await run();

    expect(result).toEqual({ exitCode: 1 });
    expect(stdout.text).toBe("");
    expect(stripVTControlCharacters(stderr.text)).toBe(
      'Error: Line 2: Amount "1.00001" has 5 fractional digits, at most 4 are allowed\n',
    );
  });

  it("fails on a missing input file", async () => {
    const { stdout, run } = setup(engine, fixture("missing.csv"));

    expect(await run()).toEqual({ exitCode: 1 });
    expect(stdout.text).toBe("");
  });
});

describe("runCli on arithmetic overflow", () => {
  it("reports the overflow from the serial engine", async () => {
    const { stdout, stderr, run } = setup("serial", fixture("overflow.csv"));

    expect(await run()).toEqual({ exitCode: 1 });
    expect(stdout.text).toBe("");
    expect(stripVTControlCharacters(stderr.text)).toBe(`Error: ${OVERFLOW}\n`);
  });

  it("reports the failed worker from the stream engine", async () => {
    const { stdout, stderr, log, run } = setup("stream", fixture("overflow.csv"));

    expect(await run()).toEqual({ exitCode: 1 });
    expect(stdout.text).toBe("");
    expect(stripVTControlCharacters(stderr.text)).toBe(
      `Error: 1 client worker(s) failed: 1 (${OVERFLOW})\n`,
    );
    expect(log.entries()).toContainEqual(
      expect.objectContaining({ msg: "Client worker failed", clientId: 1 }),
    );
  });
});

describe("describeError", () => {
  it("falls back to String for non-errors", () => {
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});
