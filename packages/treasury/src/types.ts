/**
 * @hourglass/treasury — Collaborator boundaries and treasury errors.
 *
 * The executor never owns membership or proposals. It reads them through
 * these two interfaces and reaches the registry's burn entry point only
 * through the invoke primitive.
 */

import type { Address, Hex } from "@hourglass/types";

// =============================================================================
// Membership Registry
// =============================================================================

export interface MembershipRegistry {
  /** Chain address the burn call is sent to */
  readonly address: Address;

  /** Number of units in existence */
  totalSupply(): bigint;

  /** Owner of a unit, or undefined if the unit does not exist */
  ownerOf(unitId: bigint): Address | undefined;
}

// =============================================================================
// Proposal Source
// =============================================================================

export type ProposalState =
  | "pending"
  | "active"
  | "canceled"
  | "defeated"
  | "succeeded"
  | "queued"
  | "expired"
  | "executed";

/**
 * States whose action values are treated as committed treasury.
 */
export const LIVE_PROPOSAL_STATES: ReadonlySet<ProposalState> = new Set<ProposalState>([
  "pending",
  "active",
  "queued",
]);

/**
 * A proposal's actions as parallel arrays, index i describing action i.
 */
export interface ProposalActions {
  readonly targets: readonly Address[];
  readonly values: readonly bigint[];
  readonly signatures: readonly string[];
  readonly calldatas: readonly Hex[];
}

export interface ProposalSource {
  proposalCount(): bigint;
  state(index: bigint): ProposalState;
  getActions(index: bigint): ProposalActions;
}

// =============================================================================
// Errors
// =============================================================================

export type CollaboratorErrorCode =
  | "NOT_BURNER"
  | "NONEXISTENT_UNIT"
  | "UNKNOWN_PROPOSAL"
  | "MISMATCHED_ACTIONS"
  | "UNSUPPORTED_CALL";

/**
 * Raised by the in-memory collaborators. Inside an executor transaction it
 * surfaces as the cause of an ExternalCallError.
 */
export class CollaboratorError extends Error {
  public readonly code: CollaboratorErrorCode;
  constructor(code: CollaboratorErrorCode, message: string) {
    super(message);
    this.name = "CollaboratorError";
    this.code = code;
  }
}
