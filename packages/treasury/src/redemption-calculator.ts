/**
 * RedemptionCalculator — how much pooled value one unit redeems for.
 *
 * Holds the redemption rate (journaled) and combines the executor's
 * balance, the allocated treasury and the membership supply through
 * the redemption curve. Every input is read at call time.
 */

import { assertUint256, checkedSub } from "@hourglass/ledger";
import type { ChainHost, Journaled } from "@hourglass/chain";
import type { AdminAuthority } from "@hourglass/timelock";
import type { Address, NotificationSink } from "@hourglass/types";
import type { MembershipRegistry } from "./types.js";
import type { ObligationAggregator } from "./obligation-aggregator.js";
import { redemptionCurve } from "./redemption-curve.js";

export interface RedemptionCalculatorOptions {
  readonly host: ChainHost;
  readonly authority: AdminAuthority;
  readonly membership: MembershipRegistry;
  readonly aggregator: ObligationAggregator;
  readonly sink: NotificationSink;
  /** Initial rate in basis points. Default: 0 */
  readonly redemptionRate?: bigint;
}

export class RedemptionCalculator implements Journaled<bigint> {
  private readonly host: ChainHost;
  private readonly authority: AdminAuthority;
  private readonly membership: MembershipRegistry;
  private readonly aggregator: ObligationAggregator;
  private readonly sink: NotificationSink;
  private rate: bigint;

  constructor(options: RedemptionCalculatorOptions) {
    this.host = options.host;
    this.authority = options.authority;
    this.membership = options.membership;
    this.aggregator = options.aggregator;
    this.sink = options.sink;
    this.rate = assertUint256(options.redemptionRate ?? 0n, "rate");
  }

  private get self(): Address {
    return this.authority.self;
  }

  get redemptionRate(): bigint {
    return this.rate;
  }

  /** The executor's native balance. */
  totalTreasury(): bigint {
    return this.host.balanceOf(this.self);
  }

  allocatedTreasury(): bigint {
    return this.aggregator.allocatedTreasury();
  }

  /**
   * @throws ArithmeticError UNDERFLOW when allocations exceed the balance
   * @throws ArithmeticError DIVISION_BY_ZERO when no units exist
   */
  calculateRedemption(): bigint {
    const pool = checkedSub(this.totalTreasury(), this.allocatedTreasury());
    return redemptionCurve(this.rate, this.membership.totalSupply(), pool);
  }

  /**
   * Admin-only. No upper bound is enforced.
   */
  setRedemptionRate(caller: Address, newRate: bigint): void {
    this.authority.requireAdmin(caller);
    this.rate = assertUint256(newRate, "rate");
    this.sink.emit(this.self, { type: "NewRedemptionRate", rate: newRate });
  }

  snapshot(): bigint {
    return this.rate;
  }

  restore(snapshot: bigint): void {
    this.rate = snapshot;
  }
}
