/**
 * @hourglass/ledger — Checked uint256 arithmetic.
 *
 * Values are bigint internally, so intermediates never overflow; every
 * result is checked against the uint256 range instead.
 *
 * Rules:
 * - No floating-point operations
 * - Division rounds toward zero (floor, since operands are unsigned)
 * - Results outside [0, 2^256) throw ArithmeticError
 */

import { ArithmeticError } from "@hourglass/types";

export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * Assert that a value fits in a uint256.
 * Throws ArithmeticError (UNDERFLOW for negatives, OVERFLOW above the max).
 */
export function assertUint256(value: bigint, label = "value"): bigint {
  if (value < 0n) {
    throw new ArithmeticError("UNDERFLOW", `${label} is negative: ${value}`);
  }
  if (value > MAX_UINT256) {
    throw new ArithmeticError("OVERFLOW", `${label} exceeds uint256: ${value}`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertUint256(assertUint256(a, "a") + assertUint256(b, "b"), "sum");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  assertUint256(a, "a");
  assertUint256(b, "b");
  if (b > a) {
    throw new ArithmeticError("UNDERFLOW", `Cannot subtract ${b} from ${a}`);
  }
  return a - b;
}

/**
 * floor(x * y / denominator) with a full-precision intermediate.
 *
 * Equivalent to a 512-bit mulDiv: x * y may exceed 2^256 as long as the
 * quotient fits.
 *
 * 1_000_000n * 1n / 100n → 10_000n
 * MAX_UINT256 * 2n / 2n  → MAX_UINT256
 */
export function mulDiv(x: bigint, y: bigint, denominator: bigint): bigint {
  assertUint256(x, "x");
  assertUint256(y, "y");
  assertUint256(denominator, "denominator");
  if (denominator === 0n) {
    throw new ArithmeticError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  return assertUint256((x * y) / denominator, "mulDiv result");
}
