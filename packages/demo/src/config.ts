/**
 * @hourglass/demo — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { MAXIMUM_DELAY, MINIMUM_DELAY, Uint256Schema } from "@hourglass/timelock";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Executor
  HOURGLASS_DELAY_SECONDS: Uint256Schema.default("172800").refine(
    (delay) => delay >= MINIMUM_DELAY && delay <= MAXIMUM_DELAY,
    `must be between ${MINIMUM_DELAY} and ${MAXIMUM_DELAY}`,
  ),
  HOURGLASS_REDEMPTION_RATE_BPS: Uint256Schema.default("5000").refine(
    (rate) => rate <= 10_000n,
    "must not exceed 10000 basis points",
  ),

  // Initial state
  HOURGLASS_TREASURY_WEI: Uint256Schema.default("100000000000000000000"),
  HOURGLASS_MEMBERS: z.coerce.number().int().min(1).max(10_000).default(100),
});

export type DemoConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  return ConfigSchema.parse(env);
}
