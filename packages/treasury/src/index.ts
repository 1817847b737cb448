/**
 * @hourglass/treasury — Redemption accounting and the executor contract.
 *
 * Provides:
 * - ObligationAggregator: value committed to live proposals
 * - RedemptionCalculator / redemptionCurve: per-unit redemption amount
 * - TreasuryExecutor: timelock + treasury as one chain contract
 * - In-memory membership registry and proposal source
 * - ExecutorClient: typed calls into a deployed executor
 *
 * @packageDocumentation
 */

// Collaborators
export type {
  MembershipRegistry,
  ProposalSource,
  ProposalState,
  ProposalActions,
  CollaboratorErrorCode,
} from "./types.js";
export { LIVE_PROPOSAL_STATES, CollaboratorError } from "./types.js";

// Accounting
export { ObligationAggregator } from "./obligation-aggregator.js";
export { redemptionCurve, MAX_REDEMPTION_RATE } from "./redemption-curve.js";
export { RedemptionCalculator } from "./redemption-calculator.js";
export type { RedemptionCalculatorOptions } from "./redemption-calculator.js";

// Executor
export { TreasuryExecutor } from "./treasury-executor.js";
export type { TreasuryExecutorOptions } from "./treasury-executor.js";
export { treasuryAbi, membershipAbi } from "./abi.js";
export { ExecutorConfigSchema, parseExecutorConfig } from "./config.js";
export type { ExecutorConfig, ExecutorConfigInput } from "./config.js";

// In-memory collaborators
export { InMemoryMembershipRegistry } from "./in-memory-membership-registry.js";
export type { InMemoryMembershipRegistryOptions } from "./in-memory-membership-registry.js";
export { InMemoryProposalSource } from "./in-memory-proposal-source.js";
export type { ProposalAction } from "./in-memory-proposal-source.js";

// Client
export { ExecutorClient, TimelockNamespace, TreasuryNamespace } from "./executor-client.js";
