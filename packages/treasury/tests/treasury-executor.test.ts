/**
 * Tests for TreasuryExecutor.
 *
 * Verifies:
 * - Redemption: ownership check, burn, payout, notification
 * - All-or-nothing: a failed burn or payout rolls back everything
 * - Rate setter: admin-only, unbounded
 * - Read accessors and calldata dispatch (treasury, timelock, fallback)
 */

import { describe, it, expect } from "vitest";
import { decodeFunctionResult, encodeFunctionData } from "viem";
import { MINIMUM_DELAY } from "@hourglass/timelock";
import { ExternalCallError, HourglassError } from "@hourglass/types";
import { TreasuryExecutor } from "../src/treasury-executor.js";
import { treasuryAbi } from "../src/abi.js";
import { MAX_REDEMPTION_RATE } from "../src/redemption-curve.js";
import {
  ADMIN,
  deployTreasury,
  EXECUTOR,
  HOLDER,
  MEMBERSHIP,
  mintMany,
  OTHER,
  PAYEE,
  Rejecting,
} from "./helpers.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof HourglassError) return error.code;
    throw error;
  }
  return undefined;
}

// =============================================================================
// Redemption
// =============================================================================

describe("redeemForETH", () => {
  it("burns the unit and pays the curve amount", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    const [unit] = mintMany(fx.membership, HOLDER, 1);
    mintMany(fx.membership, OTHER, 99);
    if (unit === undefined) throw new Error("mint failed");

    const paid = fx.executor.redeemForETH(HOLDER, unit);

    expect(paid).toBe(5_050n);
    expect(fx.chain.balanceOf(HOLDER)).toBe(5_050n);
    expect(fx.chain.balanceOf(EXECUTOR)).toBe(994_950n);
    expect(fx.membership.ownerOf(unit)).toBeUndefined();
    expect(fx.membership.totalSupply()).toBe(99n);
  });

  it("notifies Redeem with holder, unit and amount", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    mintMany(fx.membership, HOLDER, 100);

    fx.executor.redeemForETH(HOLDER, 1n);

    expect(fx.store.read({ type: "Redeem" }).map((r) => r.notification)).toEqual([
      { type: "Redeem", holder: HOLDER, unitId: 1n, amount: 5_050n },
    ]);
  });

  it("recomputes from the aggregate state on each call", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    mintMany(fx.membership, HOLDER, 100);

    fx.executor.redeemForETH(HOLDER, 1n);
    // pool 994,950 over 99 units: base 10,050, bonus 50
    expect(fx.executor.redeemForETH(HOLDER, 2n)).toBe(5_075n);
  });

  it("excludes allocated treasury from the pool", () => {
    const fx = deployTreasury({ rate: MAX_REDEMPTION_RATE, treasury: 1_000n });
    mintMany(fx.membership, HOLDER, 2);
    fx.proposals.propose([
      { target: PAYEE, value: 600n },
      { target: PAYEE, value: 1n },
    ]);

    expect(fx.executor.redeemForETH(HOLDER, 1n)).toBe(200n);
  });

  it("rejects a caller who does not own the unit and changes nothing", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    mintMany(fx.membership, HOLDER, 100);

    expect(codeOf(() => fx.executor.redeemForETH(OTHER, 1n))).toBe("NOT_UNIT_OWNER");
    expect(fx.membership.ownerOf(1n)).toBe(HOLDER);
    expect(fx.membership.totalSupply()).toBe(100n);
    expect(fx.chain.balanceOf(EXECUTOR)).toBe(1_000_000n);
    expect(fx.chain.balanceOf(OTHER)).toBe(0n);
    expect(fx.store.position()).toBe(0);
  });

  it("rejects a unit that does not exist", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000n });
    mintMany(fx.membership, HOLDER, 1);
    expect(codeOf(() => fx.executor.redeemForETH(HOLDER, 42n))).toBe("NOT_UNIT_OWNER");
  });

  it("rolls back when the registry refuses the burn", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n, burner: OTHER });
    mintMany(fx.membership, HOLDER, 100);

    let caught: unknown;
    try {
      fx.executor.redeemForETH(HOLDER, 1n);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExternalCallError);
    if (!(caught instanceof ExternalCallError)) return;
    expect(caught.code).toBe("BURN_FAILED");
    expect(fx.membership.ownerOf(1n)).toBe(HOLDER);
    expect(fx.chain.balanceOf(EXECUTOR)).toBe(1_000_000n);
  });

  it("rolls back the burn when the payout fails", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    const refuser = "0x000000000000000000000000000000000000dead";
    fx.chain.deploy(refuser, new Rejecting());
    mintMany(fx.membership, refuser, 100);

    expect(codeOf(() => fx.executor.redeemForETH(refuser, 1n))).toBe("TRANSFER_FAILED");
    expect(fx.membership.ownerOf(1n)).toBe(refuser);
    expect(fx.membership.totalSupply()).toBe(100n);
    expect(fx.chain.balanceOf(EXECUTOR)).toBe(1_000_000n);
    expect(fx.store.position()).toBe(0);
  });

  it("still burns at rate 0 and pays nothing", () => {
    const fx = deployTreasury({ treasury: 1_000n });
    mintMany(fx.membership, HOLDER, 1);

    expect(fx.executor.redeemForETH(HOLDER, 1n)).toBe(0n);
    expect(fx.membership.totalSupply()).toBe(0n);
  });
});

// =============================================================================
// Redemption rate
// =============================================================================

describe("setRedemptionRate", () => {
  it("lets the admin change the rate and notifies", () => {
    const fx = deployTreasury();
    fx.executor.setRedemptionRate(ADMIN, 2_500n);

    expect(fx.executor.calculator.redemptionRate).toBe(2_500n);
    expect(fx.store.read().map((r) => r.notification)).toEqual([
      { type: "NewRedemptionRate", rate: 2_500n },
    ]);
  });

  it("rejects anyone else", () => {
    const fx = deployTreasury({ rate: 100n });
    expect(codeOf(() => fx.executor.setRedemptionRate(OTHER, 2_500n))).toBe("NOT_ADMIN");
    expect(fx.executor.calculator.redemptionRate).toBe(100n);
  });

  it("accepts a rate above the maximum, after which redemption underflows", () => {
    const fx = deployTreasury({ treasury: 1_000n });
    mintMany(fx.membership, HOLDER, 10);

    fx.executor.setRedemptionRate(ADMIN, MAX_REDEMPTION_RATE + 1n);
    expect(codeOf(() => fx.executor.calculator.calculateRedemption())).toBe("UNDERFLOW");
  });
});

// =============================================================================
// Calculator inputs
// =============================================================================

describe("calculateRedemption", () => {
  it("reads the executor balance as total treasury", () => {
    const fx = deployTreasury({ treasury: 123n });
    expect(fx.executor.calculator.totalTreasury()).toBe(123n);
  });

  it("fails with DIVISION_BY_ZERO when no units exist", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000n });
    expect(codeOf(() => fx.executor.calculator.calculateRedemption())).toBe("DIVISION_BY_ZERO");
  });

  it("fails with UNDERFLOW when allocations exceed the balance", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 100n });
    mintMany(fx.membership, HOLDER, 1);
    fx.proposals.propose([
      { target: PAYEE, value: 101n },
      { target: PAYEE, value: 0n },
    ]);
    expect(codeOf(() => fx.executor.calculator.calculateRedemption())).toBe("UNDERFLOW");
  });

  it("combines balance, allocation and supply", () => {
    const fx = deployTreasury({ rate: 5_000n, treasury: 1_000_000n });
    mintMany(fx.membership, HOLDER, 100);
    fx.proposals.propose([
      { target: PAYEE, value: 200_000n },
      { target: PAYEE, value: 5n },
    ]);

    expect(fx.executor.calculator.allocatedTreasury()).toBe(200_000n);
    // pool 800,000: base 8,000 * 5,050 / 10,000
    expect(fx.executor.calculator.calculateRedemption()).toBe(4_040n);
  });
});

// =============================================================================
// Construction and calldata
// =============================================================================

describe("TreasuryExecutor contract", () => {
  it("validates the initial delay", () => {
    const fx = deployTreasury();
    expect(
      codeOf(
        () =>
          new TreasuryExecutor({
            host: fx.chain,
            address: OTHER,
            admin: ADMIN,
            delay: MINIMUM_DELAY - 1n,
            membership: fx.membership,
            proposals: fx.proposals,
            sink: fx.store,
          }),
      ),
    ).toBe("DELAY_TOO_SHORT");
  });

  it("exposes the membership registry and the maximum rate", () => {
    const fx = deployTreasury();
    const membership = decodeFunctionResult({
      abi: treasuryAbi,
      functionName: "membership",
      data: fx.chain.send({
        from: OTHER,
        to: EXECUTOR,
        value: 0n,
        data: encodeFunctionData({ abi: treasuryAbi, functionName: "membership" }),
      }),
    });
    const maxRate = decodeFunctionResult({
      abi: treasuryAbi,
      functionName: "MAX_REDEMPTION_RATE",
      data: fx.chain.send({
        from: OTHER,
        to: EXECUTOR,
        value: 0n,
        data: encodeFunctionData({ abi: treasuryAbi, functionName: "MAX_REDEMPTION_RATE" }),
      }),
    });

    expect(membership.toLowerCase()).toBe(MEMBERSHIP);
    expect(maxRate).toBe(10_000n);
  });

  it("routes timelock calldata to the timelock", () => {
    const fx = deployTreasury();
    expect(fx.client.timelock.admin().toLowerCase()).toBe(ADMIN);
    expect(fx.client.timelock.delay()).toBe(MINIMUM_DELAY);
  });

  it("accepts value with empty or unknown calldata", () => {
    const fx = deployTreasury();
    fx.chain.fund(OTHER, 30n);
    fx.chain.send({ from: OTHER, to: EXECUTOR, value: 10n, data: "0x" });
    fx.chain.send({ from: OTHER, to: EXECUTOR, value: 20n, data: "0xcafebabe" });

    expect(fx.executor.calculator.totalTreasury()).toBe(30n);
  });
});
