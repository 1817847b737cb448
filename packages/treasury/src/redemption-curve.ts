/**
 * Redemption curve.
 *
 *   rate == 0    → 0
 *   rate == MAX  → pool / supply
 *   otherwise    → (pool / supply) * (rate + (MAX - rate) / supply) / MAX
 *
 * Every multiply-then-divide step is a floor mulDiv. Zero supply fails
 * with DIVISION_BY_ZERO; a rate above MAX fails with UNDERFLOW.
 */

import { checkedAdd, checkedSub, mulDiv } from "@hourglass/ledger";

/** Basis-point denominator of the redemption rate. */
export const MAX_REDEMPTION_RATE = 10_000n;

export function redemptionCurve(rate: bigint, supply: bigint, pool: bigint): bigint {
  if (rate === 0n) {
    return 0n;
  }

  const base = mulDiv(pool, 1n, supply);
  if (rate === MAX_REDEMPTION_RATE) {
    return base;
  }

  const bonus = mulDiv(1n, checkedSub(MAX_REDEMPTION_RATE, rate), supply);
  return mulDiv(base, checkedAdd(rate, bonus), MAX_REDEMPTION_RATE);
}
