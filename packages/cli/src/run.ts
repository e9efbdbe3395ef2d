/**
 * @payledger/cli — One CLI run.
 *
 * Streams the input CSV through the configured engine and writes the
 * snapshot CSV to stdout.
 *
 * Rules:
 * - Exit code 0 on success, 1 on any fatal error
 * - On failure nothing reaches stdout; a one-line red message goes to stderr
 */

import type { Writable } from "node:stream";
import chalk from "chalk";
import type { Logger } from "pino";
import { CsvSnapshotSink, CsvTransactionSource } from "@payledger/csv";
import { createEngine, EngineError, runEngine } from "@payledger/engine";
import type { RunSummary } from "@payledger/engine";
import { LedgerStore } from "@payledger/ledger";
import type { CliConfig } from "./config.js";
import { logEngineEvent } from "./logger.js";

export interface CliIo {
  readonly stdout: Writable;
  readonly stderr: Writable;
}

export interface CliRunOptions {
  readonly inputPath: string;
  readonly config: Pick<CliConfig, "PAYLEDGER_ENGINE">;
  readonly logger: Logger;
  readonly io: CliIo;
}

export interface CliRunResult {
  readonly exitCode: 0 | 1;
  readonly summary?: RunSummary;
}

/**
 * One-line description of a fatal error for stderr.
 */
export function describeError(err: unknown): string {
  if (err instanceof EngineError && err.cause instanceof Error) {
    return `${err.message} (${err.cause.message})`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export async function runCli(options: CliRunOptions): Promise<CliRunResult> {
  const { inputPath, config, logger, io } = options;
  const engine = createEngine(config.PAYLEDGER_ENGINE, new LedgerStore(), {
    onEvent: (event) => logEngineEvent(logger, event),
  });

  try {
    const summary = await runEngine(
      engine,
      new CsvTransactionSource(inputPath),
      new CsvSnapshotSink(io.stdout),
    );
    logger.info({ ...summary, input: inputPath }, "Run completed");
    return { exitCode: 0, summary };
  } catch (err: unknown) {
    logger.error({ err, input: inputPath }, "Run failed");
    io.stderr.write(`${chalk.red(`Error: ${describeError(err)}`)}\n`);
    return { exitCode: 1 };
  }
}
