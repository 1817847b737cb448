/**
 * ObligationAggregator — treasury committed to live proposals.
 *
 * Walks every proposal index in [0, proposalCount) and, for proposals
 * in a live state, adds the values of all actions except the last one.
 * The last action of each proposal is intentionally left out of the sum.
 */

import { checkedAdd } from "@hourglass/ledger";
import { LIVE_PROPOSAL_STATES } from "./types.js";
import type { ProposalSource } from "./types.js";

export class ObligationAggregator {
  private readonly source: ProposalSource;

  constructor(source: ProposalSource) {
    this.source = source;
  }

  allocatedTreasury(): bigint {
    let total = 0n;
    const count = this.source.proposalCount();

    for (let index = 0n; index < count; index++) {
      if (!LIVE_PROPOSAL_STATES.has(this.source.state(index))) continue;

      const { values } = this.source.getActions(index);
      for (const value of values.slice(0, -1)) {
        total = checkedAdd(total, value);
      }
    }

    return total;
  }
}
