/**
 * Executor configuration schema.
 *
 * Accepts the loose shapes configuration arrives in (decimal strings,
 * numbers, lowercase addresses) and produces bigints and checksummed
 * addresses.
 */

import { z } from "zod";
import {
  AddressSchema,
  MAXIMUM_DELAY,
  MINIMUM_DELAY,
  Uint256Schema,
} from "@hourglass/timelock";

export const ExecutorConfigSchema = z.object({
  /** Address the executor is deployed at */
  address: AddressSchema,
  admin: AddressSchema,
  delay: Uint256Schema.refine(
    (delay) => delay >= MINIMUM_DELAY && delay <= MAXIMUM_DELAY,
    `delay must be between ${MINIMUM_DELAY} and ${MAXIMUM_DELAY} seconds`,
  ),
  redemptionRate: Uint256Schema.default(0n),
});

export type ExecutorConfigInput = z.input<typeof ExecutorConfigSchema>;
export type ExecutorConfig = z.output<typeof ExecutorConfigSchema>;

/**
 * @throws ZodError on invalid input
 */
export function parseExecutorConfig(input: unknown): ExecutorConfig {
  return ExecutorConfigSchema.parse(input);
}
