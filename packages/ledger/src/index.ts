/**
 * @hourglass/ledger — Native value accounting for the chain host.
 *
 * Provides:
 * - ValueLedger: per-address native balances with snapshot/restore
 * - uint256 checked arithmetic, including full-precision mulDiv
 *
 * @packageDocumentation
 */

export { ValueLedger } from "./value-ledger.js";

export {
  MAX_UINT256,
  assertUint256,
  checkedAdd,
  checkedSub,
  mulDiv,
} from "./uint-math.js";

export type { LedgerSnapshot, LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";
