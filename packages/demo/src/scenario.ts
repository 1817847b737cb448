/**
 * @hourglass/demo — The walkthrough scenario.
 *
 * Deploys an executor on a local chain and drives it through its whole
 * lifecycle with top-level transactions:
 * rate -> delay change -> payment -> admin transfer -> redemption -> audit
 *
 * Output goes through a ScenarioReporter so the same run can print to a
 * terminal or be asserted on in tests.
 */

import { encodeAbiParameters, parseAbiParameters } from "viem";
import type { Logger } from "pino";
import { LocalChain, ManualClock } from "@hourglass/chain";
import { InMemoryNotificationStore } from "@hourglass/event-store";
import { MAXIMUM_DELAY } from "@hourglass/timelock";
import {
  ExecutorClient,
  InMemoryMembershipRegistry,
  InMemoryProposalSource,
  TreasuryExecutor,
} from "@hourglass/treasury";
import { isHourglassError } from "@hourglass/types";
import type { Address, TimelockAction } from "@hourglass/types";
import type { DemoConfig } from "./config.js";

// =============================================================================
// Participants
// =============================================================================

export const EXECUTOR: Address = "0x00000000000000000000000000000000000e0e0e";
export const FOUNDER: Address = "0x00000000000000000000000000000000000f0d01";
export const COUNCIL: Address = "0x000000000000000000000000000000000c0c0c01";
export const MEMBERSHIP: Address = "0x000000000000000000000000000000000000face";
export const HOLDER: Address = "0x000000000000000000000000000000000000a11c";
export const GRANTEE: Address = "0x0000000000000000000000000000000000006a17";

/** Fixed start time so every run prints the same fingerprints. */
export const START_TIME = 1_700_000_000n;

// =============================================================================
// Reporting
// =============================================================================

export interface ScenarioReporter {
  step(title: string): void;
  ok(message: string): void;
  info(label: string, value: string): void;
  warn(message: string): void;
}

export interface ScenarioSummary {
  readonly notifications: number;
  readonly integrityValid: boolean;
  readonly finalDelay: bigint;
  readonly admin: Address;
  readonly grant: bigint;
  readonly redeemed: bigint;
  readonly treasury: bigint;
}

export type ScenarioConfig = Pick<
  DemoConfig,
  | "HOURGLASS_DELAY_SECONDS"
  | "HOURGLASS_REDEMPTION_RATE_BPS"
  | "HOURGLASS_TREASURY_WEI"
  | "HOURGLASS_MEMBERS"
>;

// =============================================================================
// Scenario
// =============================================================================

export function runScenario(
  config: ScenarioConfig,
  reporter: ScenarioReporter,
  logger: Logger,
): ScenarioSummary {
  // ─── Boot ─────────────────────────────────────────────────────────

  reporter.step("Boot");

  const clock = new ManualClock(START_TIME);
  const chain = new LocalChain({
    clock,
    log: (entry) => {
      logger.debug({ ...entry, value: entry.value.toString() }, `tx ${entry.selector} ${entry.status}`);
    },
  });

  const store = new InMemoryNotificationStore({ now: () => clock.now() });
  chain.track(store);
  store.subscribe((record) => {
    logger.info(
      { position: record.position, type: record.notification.type, hash: record.hash },
      "notification committed",
    );
  });

  const membership = new InMemoryMembershipRegistry({ host: chain, address: MEMBERSHIP, burner: EXECUTOR });
  chain.deploy(MEMBERSHIP, membership);
  const proposals = new InMemoryProposalSource();

  TreasuryExecutor.deploy(chain, {
    address: EXECUTOR,
    admin: FOUNDER,
    delay: config.HOURGLASS_DELAY_SECONDS,
    membership,
    proposals,
    sink: store,
  });
  chain.fund(EXECUTOR, config.HOURGLASS_TREASURY_WEI);

  const holderUnit = membership.mint(HOLDER);
  for (let i = 1; i < config.HOURGLASS_MEMBERS; i++) {
    membership.mint(COUNCIL);
  }

  const founder = new ExecutorClient(chain, EXECUTOR, FOUNDER);
  reporter.ok(`Executor deployed at ${EXECUTOR}`);
  reporter.info("admin", FOUNDER);
  reporter.info("delay", `${founder.timelock.delay()} s`);
  reporter.info("treasury", `${founder.treasury.totalTreasury()} wei`);
  reporter.info("members", `${membership.totalSupply()} units`);

  // ─── Redemption rate ──────────────────────────────────────────────

  reporter.step("Set Redemption Rate");

  founder.treasury.setRedemptionRate(config.HOURGLASS_REDEMPTION_RATE_BPS);
  reporter.ok(`Rate set to ${founder.treasury.redemptionRate()} bps`);

  // ─── Delay change ─────────────────────────────────────────────────

  reporter.step("Change Delay Through the Timelock");

  const doubled = config.HOURGLASS_DELAY_SECONDS * 2n;
  const newDelay = doubled > MAXIMUM_DELAY ? MAXIMUM_DELAY : doubled;
  const setDelay: TimelockAction = {
    target: EXECUTOR,
    value: 0n,
    signature: "setDelay(uint256)",
    data: encodeAbiParameters(parseAbiParameters("uint256"), [newDelay]),
    eta: clock.now() + founder.timelock.delay(),
  };
  const delayFingerprint = founder.timelock.queue(setDelay);
  reporter.info("fingerprint", delayFingerprint);
  reporter.info("eta", String(setDelay.eta));

  try {
    founder.timelock.execute(setDelay);
    reporter.warn("Executed before eta");
  } catch (error) {
    if (!isHourglassError(error)) throw error;
    reporter.ok(`Early execution refused (${error.code})`);
  }

  clock.set(setDelay.eta);
  founder.timelock.execute(setDelay);
  reporter.ok(`Delay is now ${founder.timelock.delay()} s`);

  // ─── Payment ──────────────────────────────────────────────────────

  reporter.step("Fund a Grant");

  const grant = config.HOURGLASS_TREASURY_WEI / 10n;
  const proposal = proposals.propose([
    { target: GRANTEE, value: grant },
    { target: GRANTEE, value: 0n, signature: "acknowledge()" },
  ]);
  reporter.info("allocated", `${founder.treasury.allocatedTreasury()} wei`);

  const payment: TimelockAction = {
    target: GRANTEE,
    value: grant,
    signature: "",
    data: "0x",
    eta: clock.now() + founder.timelock.delay(),
  };
  founder.timelock.queue(payment);
  clock.set(payment.eta);
  founder.timelock.execute(payment);
  proposals.setState(proposal, "executed");

  reporter.ok(`Paid ${grant} wei to ${GRANTEE}`);
  reporter.info("allocated", `${founder.treasury.allocatedTreasury()} wei`);

  // ─── Admin transfer ───────────────────────────────────────────────

  reporter.step("Hand Over Admin");

  const handover: TimelockAction = {
    target: EXECUTOR,
    value: 0n,
    signature: "setPendingAdmin(address)",
    data: encodeAbiParameters(parseAbiParameters("address"), [COUNCIL]),
    eta: clock.now() + founder.timelock.delay(),
  };
  founder.timelock.queue(handover);
  clock.set(handover.eta);
  founder.timelock.execute(handover);
  reporter.info("pending admin", founder.timelock.pendingAdmin());

  const council = founder.as(COUNCIL);
  council.timelock.acceptAdmin();
  reporter.ok(`Admin is now ${council.timelock.admin()}`);

  // ─── Redemption ───────────────────────────────────────────────────

  reporter.step("Redeem a Membership Unit");

  reporter.info("quote", `${founder.treasury.calculateRedemption()} wei`);
  const redeemed = founder.as(HOLDER).treasury.redeem(holderUnit);
  reporter.ok(`Unit ${holderUnit} redeemed for ${redeemed} wei`);
  reporter.info("members", `${membership.totalSupply()} units`);

  // ─── Audit ────────────────────────────────────────────────────────

  reporter.step("Audit the Notification Log");

  for (const record of store.read()) {
    reporter.info(`#${record.position}`, `${record.notification.type} ${record.hash.slice(0, 12)}...`);
  }
  const integrity = store.verifyIntegrity();
  if (integrity.valid) {
    reporter.ok(`Hash chain verified through position ${integrity.lastVerifiedPosition}`);
  } else {
    reporter.warn(`Hash chain broken: ${integrity.errors.length} errors`);
  }

  return {
    notifications: store.position(),
    integrityValid: integrity.valid,
    finalDelay: founder.timelock.delay(),
    admin: council.timelock.admin(),
    grant,
    redeemed,
    treasury: chain.balanceOf(EXECUTOR),
  };
}
