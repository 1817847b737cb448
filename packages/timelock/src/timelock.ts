/**
 * Timelock — the timelock as a chain contract.
 *
 * Owns the HashRegistry, AdminAuthority and TimelockEngine, registers
 * their state with the host journal, and decodes calldata against
 * `timelockAbi`. Empty calldata (receive) and unknown selectors
 * (fallback) accept value and do nothing.
 */

import { decodeFunctionData, encodeFunctionResult } from "viem";
import type { CallContext, CallHandler, ChainHost } from "@hourglass/chain";
import type { Address, Hex, NotificationSink, TimelockAction } from "@hourglass/types";
import { GRACE_PERIOD, MAXIMUM_DELAY, MINIMUM_DELAY } from "./constants.js";
import { HashRegistry } from "./hash-registry.js";
import { AdminAuthority } from "./admin-authority.js";
import { TimelockEngine } from "./timelock-engine.js";
import { selectorOfCalldata, selectorsOf, timelockAbi } from "./abi.js";

export interface TimelockOptions {
  readonly host: ChainHost;
  /** Address the contract is deployed at */
  readonly self: Address;
  readonly admin: Address;
  readonly delay: bigint;
  readonly sink: NotificationSink;
}

const TIMELOCK_SELECTORS = selectorsOf(timelockAbi);

type ActionArgs = readonly [Address, bigint, string, Hex, bigint];

function toAction([target, value, signature, data, eta]: ActionArgs): TimelockAction {
  return { target, value, signature, data, eta };
}

export class Timelock implements CallHandler {
  readonly authority: AdminAuthority;
  readonly registry: HashRegistry;
  readonly engine: TimelockEngine;

  /**
   * @throws BoundsError if the initial delay is out of bounds
   */
  constructor(options: TimelockOptions) {
    this.registry = new HashRegistry();
    this.authority = new AdminAuthority({
      self: options.self,
      admin: options.admin,
      delay: options.delay,
      sink: options.sink,
    });
    this.engine = new TimelockEngine({
      host: options.host,
      authority: this.authority,
      registry: this.registry,
      sink: options.sink,
    });

    options.host.track(this.registry);
    options.host.track(this.authority);
  }

  get self(): Address {
    return this.authority.self;
  }

  /** True when the calldata names a timelock function. */
  recognizes(data: Hex): boolean {
    const selector = selectorOfCalldata(data);
    return selector !== undefined && TIMELOCK_SELECTORS.has(selector);
  }

  handleCall(context: CallContext): Hex {
    if (!this.recognizes(context.data)) {
      // receive / fallback
      return "0x";
    }

    const call = decodeFunctionData({ abi: timelockAbi, data: context.data });
    const caller = context.caller;

    switch (call.functionName) {
      case "GRACE_PERIOD":
        return encodeFunctionResult({ abi: timelockAbi, functionName: "GRACE_PERIOD", result: GRACE_PERIOD });
      case "MINIMUM_DELAY":
        return encodeFunctionResult({ abi: timelockAbi, functionName: "MINIMUM_DELAY", result: MINIMUM_DELAY });
      case "MAXIMUM_DELAY":
        return encodeFunctionResult({ abi: timelockAbi, functionName: "MAXIMUM_DELAY", result: MAXIMUM_DELAY });
      case "admin":
        return encodeFunctionResult({ abi: timelockAbi, functionName: "admin", result: this.authority.admin });
      case "pendingAdmin":
        return encodeFunctionResult({
          abi: timelockAbi,
          functionName: "pendingAdmin",
          result: this.authority.pendingAdmin,
        });
      case "delay":
        return encodeFunctionResult({ abi: timelockAbi, functionName: "delay", result: this.authority.delay });
      case "queuedTransactions":
        return encodeFunctionResult({
          abi: timelockAbi,
          functionName: "queuedTransactions",
          result: this.registry.isQueued(call.args[0]),
        });
      case "setDelay":
        this.authority.setDelay(caller, call.args[0]);
        return "0x";
      case "setPendingAdmin":
        this.authority.setPendingAdmin(caller, call.args[0]);
        return "0x";
      case "acceptAdmin":
        this.authority.acceptAdmin(caller);
        return "0x";
      case "queueTransaction":
        return encodeFunctionResult({
          abi: timelockAbi,
          functionName: "queueTransaction",
          result: this.engine.queueTransaction(caller, toAction(call.args)),
        });
      case "cancelTransaction":
        this.engine.cancelTransaction(caller, toAction(call.args));
        return "0x";
      case "executeTransaction":
        return encodeFunctionResult({
          abi: timelockAbi,
          functionName: "executeTransaction",
          result: this.engine.executeTransaction(caller, toAction(call.args)),
        });
    }
  }
}
