/**
 * Zod schema for timelock actions arriving as JSON.
 *
 * `value` and `eta` are uint256 and travel as decimal strings (or safe
 * integers); `data` is even-length hex.
 */

import { z } from "zod";
import { getAddress } from "viem";
import { MAX_UINT256 } from "@hourglass/ledger";
import { isAddress, isHex } from "@hourglass/types";
import type { TimelockAction } from "@hourglass/types";

export const Uint256Schema = z
  .union([z.string().regex(/^\d+$/, "must be a decimal integer"), z.number().int().nonnegative().safe(), z.bigint()])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_UINT256, "must fit in uint256");

export const AddressSchema = z
  .string()
  .refine(isAddress, "must be a 20-byte hex address")
  .transform((value) => getAddress(value));

export const HexSchema = z.string().refine(isHex, "must be even-length 0x-prefixed hex");

export const TimelockActionSchema = z.object({
  target: AddressSchema,
  value: Uint256Schema,
  signature: z.string().default(""),
  data: HexSchema.default("0x"),
  eta: Uint256Schema,
});

export type TimelockActionInput = z.input<typeof TimelockActionSchema>;

/**
 * @throws ZodError on invalid input
 */
export function parseTimelockAction(input: unknown): TimelockAction {
  return TimelockActionSchema.parse(input);
}
