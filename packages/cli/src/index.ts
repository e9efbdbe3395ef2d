/**
 * @payledger/cli — Programmatic surface of the command line.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { CliConfig } from "./config.js";
export { createLogger, logEngineEvent } from "./logger.js";
export { runCli, describeError } from "./run.js";
export type { CliIo, CliRunOptions, CliRunResult } from "./run.js";
