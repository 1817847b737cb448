/**
 * InMemoryProposalSource — proposals and their lifecycle, set by hand.
 *
 * New proposals start "pending"; tests and the demo move them through
 * states with setState.
 */

import type { Address, Hex } from "@hourglass/types";
import { CollaboratorError } from "./types.js";
import type { ProposalActions, ProposalSource, ProposalState } from "./types.js";

export interface ProposalAction {
  readonly target: Address;
  readonly value: bigint;
  readonly signature?: string;
  readonly calldata?: Hex;
}

interface StoredProposal {
  state: ProposalState;
  readonly actions: ProposalActions;
}

export class InMemoryProposalSource implements ProposalSource {
  private readonly proposals: StoredProposal[] = [];

  /**
   * Add a proposal and return its index.
   */
  propose(actions: readonly ProposalAction[], state: ProposalState = "pending"): bigint {
    this.proposals.push({
      state,
      actions: {
        targets: actions.map((a) => a.target),
        values: actions.map((a) => a.value),
        signatures: actions.map((a) => a.signature ?? ""),
        calldatas: actions.map((a) => a.calldata ?? "0x"),
      },
    });
    return BigInt(this.proposals.length - 1);
  }

  /**
   * Add a proposal from parallel arrays, as a governor would receive it.
   */
  proposeRaw(actions: ProposalActions, state: ProposalState = "pending"): bigint {
    const length = actions.targets.length;
    if (
      actions.values.length !== length ||
      actions.signatures.length !== length ||
      actions.calldatas.length !== length
    ) {
      throw new CollaboratorError(
        "MISMATCHED_ACTIONS",
        "targets, values, signatures and calldatas must have the same length",
      );
    }
    this.proposals.push({
      state,
      actions: {
        targets: [...actions.targets],
        values: [...actions.values],
        signatures: [...actions.signatures],
        calldatas: [...actions.calldatas],
      },
    });
    return BigInt(this.proposals.length - 1);
  }

  setState(index: bigint, state: ProposalState): void {
    this.get(index).state = state;
  }

  proposalCount(): bigint {
    return BigInt(this.proposals.length);
  }

  state(index: bigint): ProposalState {
    return this.get(index).state;
  }

  getActions(index: bigint): ProposalActions {
    return this.get(index).actions;
  }

  private get(index: bigint): StoredProposal {
    const proposal = index >= 0n ? this.proposals[Number(index)] : undefined;
    if (proposal === undefined) {
      throw new CollaboratorError("UNKNOWN_PROPOSAL", `Proposal ${index} does not exist`);
    }
    return proposal;
  }
}
