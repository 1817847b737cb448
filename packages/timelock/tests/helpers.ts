/**
 * Shared fixtures: a chain, a notification store and a deployed Timelock.
 */

import { LocalChain, ManualClock } from "@hourglass/chain";
import type { CallContext, CallHandler } from "@hourglass/chain";
import { InMemoryNotificationStore } from "@hourglass/event-store";
import type { Address, Hex, TimelockAction } from "@hourglass/types";
import { Timelock } from "../src/timelock.js";
import { MINIMUM_DELAY } from "../src/constants.js";

export const EXECUTOR: Address = "0x00000000000000000000000000000000000e0e0e";
export const ADMIN: Address = "0x000000000000000000000000000000000000ad01";
export const OUTSIDER: Address = "0x000000000000000000000000000000000000beef";
export const CANDIDATE: Address = "0x000000000000000000000000000000000000ca0d";
export const TARGET: Address = "0x0000000000000000000000000000000000007a67";

export const GENESIS_TIME = 1_700_000_000n;

export interface Fixture {
  readonly clock: ManualClock;
  readonly chain: LocalChain;
  readonly store: InMemoryNotificationStore;
  readonly timelock: Timelock;
}

export interface DeployOptions {
  readonly delay?: bigint;
  readonly admin?: Address;
}

export function deployTimelock(options: DeployOptions = {}): Fixture {
  const clock = new ManualClock(GENESIS_TIME);
  const chain = new LocalChain({ clock });
  const store = new InMemoryNotificationStore({ now: () => clock.now() });
  chain.track(store);

  const timelock = new Timelock({
    host: chain,
    self: EXECUTOR,
    admin: options.admin ?? ADMIN,
    delay: options.delay ?? MINIMUM_DELAY,
    sink: store,
  });
  chain.deploy(EXECUTOR, timelock);
  return { clock, chain, store, timelock };
}

export function action(overrides: Partial<TimelockAction> = {}): TimelockAction {
  return {
    target: TARGET,
    value: 0n,
    signature: "",
    data: "0x",
    eta: GENESIS_TIME + MINIMUM_DELAY,
    ...overrides,
  };
}

/** Records every call it receives and returns fixed data. */
export class Recorder implements CallHandler {
  readonly calls: CallContext[] = [];
  constructor(private readonly returnData: Hex = "0x") {}

  handleCall(context: CallContext): Hex {
    this.calls.push(context);
    return this.returnData;
  }
}

/** Always reverts. */
export class Reverter implements CallHandler {
  handleCall(): Hex {
    throw new Error("target reverted");
  }
}
