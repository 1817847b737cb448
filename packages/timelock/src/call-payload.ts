import { concat, keccak256, slice, toBytes } from "viem";
import type { Hex, TimelockAction } from "@hourglass/types";

/**
 * 4-byte selector of a function signature such as "setDelay(uint256)".
 */
export function selectorOf(signature: string): Hex {
  return slice(keccak256(toBytes(signature)), 0, 4);
}

/**
 * Calldata sent to the target when an action executes: `data` as-is when
 * the signature is empty, otherwise the selector followed by `data`.
 */
export function callPayload(action: Pick<TimelockAction, "signature" | "data">): Hex {
  if (action.signature.length === 0) {
    return action.data;
  }
  return concat([selectorOf(action.signature), action.data]);
}
