import { parseAbi, toFunctionSelector } from "viem";
import type { Abi } from "viem";
import type { Hex } from "@hourglass/types";

export const timelockAbi = parseAbi([
  "function GRACE_PERIOD() view returns (uint256)",
  "function MINIMUM_DELAY() view returns (uint256)",
  "function MAXIMUM_DELAY() view returns (uint256)",
  "function admin() view returns (address)",
  "function pendingAdmin() view returns (address)",
  "function delay() view returns (uint256)",
  "function queuedTransactions(bytes32) view returns (bool)",
  "function setDelay(uint256 delay_)",
  "function setPendingAdmin(address pendingAdmin_)",
  "function acceptAdmin()",
  "function queueTransaction(address target, uint256 value, string signature, bytes data, uint256 eta) returns (bytes32)",
  "function cancelTransaction(address target, uint256 value, string signature, bytes data, uint256 eta)",
  "function executeTransaction(address target, uint256 value, string signature, bytes data, uint256 eta) payable returns (bytes)",
]);

/**
 * Lowercased 4-byte selectors of every function in an ABI.
 */
export function selectorsOf(abi: Abi): ReadonlySet<string> {
  const selectors = new Set<string>();
  for (const item of abi) {
    if (item.type === "function") {
      selectors.add(toFunctionSelector(item).toLowerCase());
    }
  }
  return selectors;
}

/** First four bytes of calldata, lowercased, or undefined when shorter. */
export function selectorOfCalldata(data: Hex): string | undefined {
  return data.length >= 10 ? data.slice(0, 10).toLowerCase() : undefined;
}
