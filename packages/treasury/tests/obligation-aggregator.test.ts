/**
 * Tests for ObligationAggregator.
 *
 * The last action of every live proposal is excluded from the sum; the
 * tests below pin that behavior down explicitly.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ArithmeticError } from "@hourglass/types";
import { MAX_UINT256 } from "@hourglass/ledger";
import { ObligationAggregator } from "../src/obligation-aggregator.js";
import { InMemoryProposalSource } from "../src/in-memory-proposal-source.js";
import type { ProposalState } from "../src/types.js";
import { PAYEE } from "./helpers.js";

function pay(...values: bigint[]): { target: typeof PAYEE; value: bigint }[] {
  return values.map((value) => ({ target: PAYEE, value }));
}

describe("ObligationAggregator", () => {
  let proposals: InMemoryProposalSource;
  let aggregator: ObligationAggregator;

  beforeEach(() => {
    proposals = new InMemoryProposalSource();
    aggregator = new ObligationAggregator(proposals);
  });

  it("is zero with no proposals", () => {
    expect(aggregator.allocatedTreasury()).toBe(0n);
  });

  it("sums every action except the last of a live proposal", () => {
    proposals.propose(pay(100n, 200n, 300n));
    expect(aggregator.allocatedTreasury()).toBe(300n);
  });

  it("counts nothing for a single-action proposal", () => {
    proposals.propose(pay(5_000n));
    expect(aggregator.allocatedTreasury()).toBe(0n);
  });

  it("counts nothing for a proposal without actions", () => {
    proposals.propose([]);
    expect(aggregator.allocatedTreasury()).toBe(0n);
  });

  it("only counts pending, active and queued proposals", () => {
    const states: ProposalState[] = [
      "pending",
      "active",
      "canceled",
      "defeated",
      "succeeded",
      "queued",
      "expired",
      "executed",
    ];
    for (const state of states) {
      proposals.propose(pay(10n, 1n), state);
    }
    expect(aggregator.allocatedTreasury()).toBe(30n);
  });

  it("follows state changes at call time", () => {
    const index = proposals.propose(pay(40n, 2n));
    expect(aggregator.allocatedTreasury()).toBe(40n);

    proposals.setState(index, "executed");
    expect(aggregator.allocatedTreasury()).toBe(0n);
  });

  it("accumulates across proposals", () => {
    proposals.propose(pay(1n, 2n, 3n));
    proposals.propose(pay(10n, 20n), "active");
    proposals.propose(pay(100n, 200n), "queued");
    expect(aggregator.allocatedTreasury()).toBe(113n);
  });

  it("fails when the sum leaves uint256", () => {
    proposals.propose(pay(MAX_UINT256, 1n, 0n));
    expect(() => aggregator.allocatedTreasury()).toThrow(ArithmeticError);
  });
});
