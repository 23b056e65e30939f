/**
 * @tally/cli — Configuration.
 *
 * Validates the parsed command-line options with Zod. There is no
 * environment-variable configuration: everything comes from argv.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const OUTPUT_ORDERS = ["first-seen", "client"] as const;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const CliConfigSchema = z.object({
  inputPath: z.string().trim().min(1, "Input path is required"),
  order: z.enum(OUTPUT_ORDERS).default("first-seen"),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
  logFile: z.string().trim().min(1).optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type OutputOrder = CliConfig["order"];
export type LogLevel = CliConfig["logLevel"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate raw options into a CliConfig.
 *
 * @throws {z.ZodError} if an option is missing or invalid
 */
export function loadConfig(raw: Record<string, unknown>): CliConfig {
  return CliConfigSchema.parse(raw);
}
