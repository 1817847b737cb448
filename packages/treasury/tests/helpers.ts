/**
 * Shared fixtures: an executor deployed on a local chain with in-memory
 * membership and proposals.
 */

import { LocalChain, ManualClock } from "@hourglass/chain";
import type { CallHandler, TransactionLogEntry } from "@hourglass/chain";
import { InMemoryNotificationStore } from "@hourglass/event-store";
import { MINIMUM_DELAY } from "@hourglass/timelock";
import type { Address, Hex } from "@hourglass/types";
import { TreasuryExecutor } from "../src/treasury-executor.js";
import { InMemoryMembershipRegistry } from "../src/in-memory-membership-registry.js";
import { InMemoryProposalSource } from "../src/in-memory-proposal-source.js";
import { ExecutorClient } from "../src/executor-client.js";

export const EXECUTOR: Address = "0x00000000000000000000000000000000000e0e0e";
export const ADMIN: Address = "0x000000000000000000000000000000000000ad01";
export const MEMBERSHIP: Address = "0x000000000000000000000000000000000000face";
export const HOLDER: Address = "0x000000000000000000000000000000000000a11c";
export const OTHER: Address = "0x0000000000000000000000000000000000000b0b";
export const PAYEE: Address = "0x000000000000000000000000000000000000fee0";

export const GENESIS_TIME = 1_700_000_000n;

export interface TreasuryFixture {
  readonly clock: ManualClock;
  readonly chain: LocalChain;
  readonly store: InMemoryNotificationStore;
  readonly membership: InMemoryMembershipRegistry;
  readonly proposals: InMemoryProposalSource;
  readonly executor: TreasuryExecutor;
  /** Client sending as ADMIN */
  readonly client: ExecutorClient;
}

export interface DeployTreasuryOptions {
  readonly rate?: bigint;
  /** Initial executor balance */
  readonly treasury?: bigint;
  readonly burner?: Address;
  readonly log?: (entry: TransactionLogEntry) => void;
}

export function deployTreasury(options: DeployTreasuryOptions = {}): TreasuryFixture {
  const clock = new ManualClock(GENESIS_TIME);
  const chain = new LocalChain({ clock, ...(options.log !== undefined ? { log: options.log } : {}) });
  const store = new InMemoryNotificationStore({ now: () => clock.now() });
  chain.track(store);

  const membership = new InMemoryMembershipRegistry({
    host: chain,
    address: MEMBERSHIP,
    burner: options.burner ?? EXECUTOR,
  });
  chain.deploy(MEMBERSHIP, membership);

  const proposals = new InMemoryProposalSource();
  const executor = TreasuryExecutor.deploy(chain, {
    address: EXECUTOR,
    admin: ADMIN,
    delay: MINIMUM_DELAY,
    membership,
    proposals,
    sink: store,
    redemptionRate: options.rate ?? 0n,
  });

  if (options.treasury !== undefined) {
    chain.fund(EXECUTOR, options.treasury);
  }

  const client = new ExecutorClient(chain, EXECUTOR, ADMIN);
  return { clock, chain, store, membership, proposals, executor, client };
}

/** Mint `count` units to `to`, returning their ids. */
export function mintMany(membership: InMemoryMembershipRegistry, to: Address, count: number): bigint[] {
  return Array.from({ length: count }, () => membership.mint(to));
}

/** Reverts on every call, including plain value transfers. */
export class Rejecting implements CallHandler {
  handleCall(): Hex {
    throw new Error("payments refused");
  }
}
