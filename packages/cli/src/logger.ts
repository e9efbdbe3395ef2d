/**
 * @payledger/cli — Logging.
 *
 * pino writes to stderr; stdout is reserved for the CSV result.
 * Engine events are mapped onto log levels here so the engines stay
 * free of any logging dependency.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { EngineEvent } from "@payledger/engine";
import type { CliConfig } from "./config.js";

const STDERR = 2;

export function createLogger(config: Pick<CliConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR));
}

/**
 * worker_spawned → debug, transaction_rejected → warn, worker_failed → error.
 */
export function logEngineEvent(logger: Logger, event: EngineEvent): void {
  switch (event.type) {
    case "worker_spawned":
      logger.debug({ clientId: event.clientId }, "Client worker spawned");
      return;
    case "transaction_rejected":
      logger.warn(
        {
          engine: event.engine,
          kind: event.record.kind,
          clientId: event.record.clientId,
          txId: event.record.txId,
          reason: event.reason,
        },
        "Transaction rejected",
      );
      return;
    case "worker_failed":
      logger.error({ clientId: event.clientId, err: event.error }, "Client worker failed");
      return;
  }
}
