/**
 * @payledger/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The engine is chosen here rather than by a command-line flag.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PAYLEDGER_ENGINE: z.enum(["serial", "stream"]).default("serial"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var holds an unsupported value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}
