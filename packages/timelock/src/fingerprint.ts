/**
 * Action fingerprinting.
 *
 * The fingerprint is keccak256 over the canonical ABI encoding of the five
 * action fields, in order. It is the only identity a queued action has.
 */

import { encodeAbiParameters, keccak256, parseAbiParameters } from "viem";
import { assertUint256 } from "@hourglass/ledger";
import type { Fingerprint, TimelockAction } from "@hourglass/types";

const ACTION_PARAMETERS = parseAbiParameters(
  "address target, uint256 value, string signature, bytes data, uint256 eta",
);

export function fingerprintOf(action: TimelockAction): Fingerprint {
  assertUint256(action.value, "value");
  assertUint256(action.eta, "eta");
  return keccak256(
    encodeAbiParameters(ACTION_PARAMETERS, [
      action.target,
      action.value,
      action.signature,
      action.data,
      action.eta,
    ]),
  );
}
