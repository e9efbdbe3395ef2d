#!/usr/bin/env tsx
/**
 * @payledger/cli — Entry point.
 *
 * payledger <input.csv>
 *
 * Loads config, builds the logger, and runs the input through the engine
 * selected by PAYLEDGER_ENGINE.
 */

import chalk from "chalk";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { describeError, runCli } from "./run.js";

const program = new Command();

program
  .name("payledger")
  .description("Apply a transactions CSV to client accounts and print the final balances")
  .version("0.1.0")
  .argument("<input>", "path to the transactions CSV (type,client,tx,amount)")
  .action(async (input: string) => {
    const config = loadConfig();
    const logger = createLogger(config);
    logger.debug({ engine: config.PAYLEDGER_ENGINE, input }, "Starting run");

    const result = await runCli({
      inputPath: input,
      config,
      logger,
      io: { stdout: process.stdout, stderr: process.stderr },
    });
    logger.flush();
    process.exitCode = result.exitCode;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`${chalk.red(`Fatal: ${describeError(err)}`)}\n`);
  process.exitCode = 1;
});
