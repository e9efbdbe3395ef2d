/**
 * In-memory streams and logger for CLI tests.
 */

import { Writable } from "node:stream";
import { fileURLToPath } from "node:url";
import pino from "pino";
import type { LevelWithSilent, Logger } from "pino";

export class MemoryWritable extends Writable {
  public text = "";

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString("utf8");
    callback();
  }
}

export interface MemoryLogger {
  readonly logger: Logger;
  /** Parsed JSON log lines, in write order. */
  entries(): unknown[];
}

export function memoryLogger(level: LevelWithSilent = "debug"): MemoryLogger {
  const lines: string[] = [];
  const logger = pino({ level }, { write: (line: string) => void lines.push(line) });
  return {
    logger,
    entries: () => lines.map((line): unknown => JSON.parse(line)),
  };
}

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}
