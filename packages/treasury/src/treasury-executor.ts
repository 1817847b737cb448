/**
 * TreasuryExecutor — the executor contract.
 *
 * Composes the Timelock with redemption accounting:
 * - Administrative actions go through the timelock (queue / cancel / execute)
 * - Holders redeem a membership unit for a share of the unallocated pool
 * - Calldata is decoded against `treasuryAbi` first, then `timelockAbi`;
 *   anything else is receive / fallback and accepts value
 *
 * All state (admin, queued set, rate, balances, notifications) is
 * journaled by the chain host, so every entry point commits fully or not
 * at all.
 */

import {
  decodeFunctionData,
  encodeAbiParameters,
  encodeFunctionData,
  encodeFunctionResult,
  parseAbiParameters,
} from "viem";
import type { CallContext, CallHandler, ChainHost, LocalChain } from "@hourglass/chain";
import {
  selectorOfCalldata,
  selectorsOf,
  Timelock,
} from "@hourglass/timelock";
import type { AdminAuthority, TimelockEngine } from "@hourglass/timelock";
import {
  AuthorizationError,
  ExternalCallError,
  sameAddress,
} from "@hourglass/types";
import type { Address, Hex, NotificationSink } from "@hourglass/types";
import type { MembershipRegistry, ProposalSource } from "./types.js";
import { ObligationAggregator } from "./obligation-aggregator.js";
import { RedemptionCalculator } from "./redemption-calculator.js";
import { MAX_REDEMPTION_RATE } from "./redemption-curve.js";
import { membershipAbi, treasuryAbi } from "./abi.js";

export interface TreasuryExecutorOptions {
  readonly host: ChainHost;
  /** Address the executor is deployed at */
  readonly address: Address;
  readonly admin: Address;
  readonly delay: bigint;
  readonly membership: MembershipRegistry;
  /** Fixed at construction; in the reference wiring, the admin's contract */
  readonly proposals: ProposalSource;
  readonly sink: NotificationSink;
  /** Basis points. Default: 0 */
  readonly redemptionRate?: bigint;
}

const TREASURY_SELECTORS = selectorsOf(treasuryAbi);
const UINT256 = parseAbiParameters("uint256");

export class TreasuryExecutor implements CallHandler {
  readonly address: Address;
  readonly timelock: Timelock;
  readonly aggregator: ObligationAggregator;
  readonly calculator: RedemptionCalculator;
  private readonly host: ChainHost;
  private readonly membership: MembershipRegistry;
  private readonly sink: NotificationSink;

  /**
   * @throws BoundsError if the initial delay is out of bounds
   */
  constructor(options: TreasuryExecutorOptions) {
    this.address = options.address;
    this.host = options.host;
    this.membership = options.membership;
    this.sink = options.sink;

    this.timelock = new Timelock({
      host: options.host,
      self: options.address,
      admin: options.admin,
      delay: options.delay,
      sink: options.sink,
    });
    this.aggregator = new ObligationAggregator(options.proposals);
    this.calculator = new RedemptionCalculator({
      host: options.host,
      authority: this.timelock.authority,
      membership: options.membership,
      aggregator: this.aggregator,
      sink: options.sink,
      ...(options.redemptionRate !== undefined ? { redemptionRate: options.redemptionRate } : {}),
    });

    options.host.track(this.calculator);
  }

  /**
   * Construct and deploy at `options.address` in one step.
   */
  static deploy(chain: LocalChain, options: Omit<TreasuryExecutorOptions, "host">): TreasuryExecutor {
    const executor = new TreasuryExecutor({ ...options, host: chain });
    chain.deploy(options.address, executor);
    return executor;
  }

  get authority(): AdminAuthority {
    return this.timelock.authority;
  }

  get engine(): TimelockEngine {
    return this.timelock.engine;
  }

  // ─── Redemption ─────────────────────────────────────────────────────

  /**
   * Burn `unitId` and pay its holder the current redemption amount.
   *
   * The amount is computed once, before the burn, from the aggregate
   * state; it is not a per-unit share.
   *
   * @throws AuthorizationError NOT_UNIT_OWNER
   * @throws ExternalCallError BURN_FAILED or TRANSFER_FAILED
   */
  redeemForETH(caller: Address, unitId: bigint): bigint {
    return this.host.atomic(() => {
      const owner = this.membership.ownerOf(unitId);
      if (owner === undefined || !sameAddress(owner, caller)) {
        throw new AuthorizationError(
          "NOT_UNIT_OWNER",
          `Caller ${caller} does not own unit ${unitId}`,
        );
      }

      const amount = this.calculator.calculateRedemption();

      const burn = this.host.invoke({
        from: this.address,
        to: this.membership.address,
        value: 0n,
        data: encodeFunctionData({ abi: membershipAbi, functionName: "burn", args: [unitId] }),
      });
      if (!burn.success) {
        throw new ExternalCallError("BURN_FAILED", `Burning unit ${unitId} failed`, burn.returnData, burn.error);
      }

      const payout = this.host.invoke({ from: this.address, to: caller, value: amount, data: "0x" });
      if (!payout.success) {
        throw new ExternalCallError(
          "TRANSFER_FAILED",
          `Paying ${amount} to ${caller} failed`,
          payout.returnData,
          payout.error,
        );
      }

      this.sink.emit(this.address, { type: "Redeem", holder: caller, unitId, amount });
      return amount;
    });
  }

  setRedemptionRate(caller: Address, newRate: bigint): void {
    this.host.atomic(() => this.calculator.setRedemptionRate(caller, newRate));
  }

  // ─── Calls ──────────────────────────────────────────────────────────

  handleCall(context: CallContext): Hex {
    const selector = selectorOfCalldata(context.data);
    if (selector === undefined || !TREASURY_SELECTORS.has(selector)) {
      return this.timelock.handleCall(context);
    }

    const call = decodeFunctionData({ abi: treasuryAbi, data: context.data });
    switch (call.functionName) {
      case "MAX_REDEMPTION_RATE":
        return this.encodeUint(MAX_REDEMPTION_RATE);
      case "redemptionRate":
        return this.encodeUint(this.calculator.redemptionRate);
      case "totalTreasury":
        return this.encodeUint(this.calculator.totalTreasury());
      case "allocatedTreasury":
        return this.encodeUint(this.calculator.allocatedTreasury());
      case "calculateRedemption":
        return this.encodeUint(this.calculator.calculateRedemption());
      case "membership":
        return encodeFunctionResult({
          abi: treasuryAbi,
          functionName: "membership",
          result: this.membership.address,
        });
      case "setRedemptionRate":
        this.setRedemptionRate(context.caller, call.args[0]);
        return "0x";
      case "redeemForETH":
        return this.encodeUint(this.redeemForETH(context.caller, call.args[0]));
    }
  }

  /** Every uint256-returning treasury function shares one encoding. */
  private encodeUint(value: bigint): Hex {
    return encodeAbiParameters(UINT256, [value]);
  }
}
