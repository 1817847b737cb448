/**
 * Timelock Action
 *
 * A proposed administrative call. Actions are never stored as records:
 * the timelock persists only their fingerprint.
 */

import type { Address, Hex } from "./primitives.js";

export interface TimelockAction {
  /** Contract or account the call is made to */
  readonly target: Address;

  /** Native value forwarded with the call (wei) */
  readonly value: bigint;

  /** Function signature, e.g. "setDelay(uint256)". Empty means raw calldata. */
  readonly signature: string;

  /** ABI-encoded arguments, or the full calldata when signature is empty */
  readonly data: Hex;

  /** Earliest execution time (unix seconds) */
  readonly eta: bigint;
}
