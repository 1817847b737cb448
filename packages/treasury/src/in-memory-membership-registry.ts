/**
 * InMemoryMembershipRegistry — a minimal non-fungible membership registry.
 *
 * Units are minted with sequential ids starting at 1. Only the configured
 * burner (normally the executor) may burn. Deployed on the chain so the
 * executor reaches `burn` through the invoke primitive.
 */

import { decodeFunctionData, encodeFunctionResult } from "viem";
import type { CallContext, CallHandler, ChainHost, Journaled } from "@hourglass/chain";
import { sameAddress, ZERO_ADDRESS } from "@hourglass/types";
import type { Address, Hex } from "@hourglass/types";
import { selectorOfCalldata, selectorsOf } from "@hourglass/timelock";
import { membershipAbi } from "./abi.js";
import { CollaboratorError } from "./types.js";
import type { MembershipRegistry } from "./types.js";

export interface InMemoryMembershipRegistryOptions {
  readonly host: ChainHost;
  readonly address: Address;
  /** The only caller allowed to burn */
  readonly burner: Address;
}

interface RegistrySnapshot {
  readonly owners: ReadonlyMap<bigint, Address>;
  readonly nextId: bigint;
}

const MEMBERSHIP_SELECTORS = selectorsOf(membershipAbi);

export class InMemoryMembershipRegistry
  implements MembershipRegistry, CallHandler, Journaled<RegistrySnapshot>
{
  readonly address: Address;
  private readonly burner: Address;
  private owners = new Map<bigint, Address>();
  private nextId = 1n;

  constructor(options: InMemoryMembershipRegistryOptions) {
    this.address = options.address;
    this.burner = options.burner;
    options.host.track(this);
  }

  mint(to: Address): bigint {
    const unitId = this.nextId;
    this.owners.set(unitId, to);
    this.nextId += 1n;
    return unitId;
  }

  totalSupply(): bigint {
    return BigInt(this.owners.size);
  }

  ownerOf(unitId: bigint): Address | undefined {
    return this.owners.get(unitId);
  }

  /** Units held by `owner`, in id order. */
  unitsOf(owner: Address): bigint[] {
    const units: bigint[] = [];
    for (const [unitId, holder] of this.owners) {
      if (sameAddress(holder, owner)) units.push(unitId);
    }
    return units.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  burn(caller: Address, unitId: bigint): void {
    if (!sameAddress(caller, this.burner)) {
      throw new CollaboratorError("NOT_BURNER", `Caller ${caller} may not burn`);
    }
    if (!this.owners.delete(unitId)) {
      throw new CollaboratorError("NONEXISTENT_UNIT", `Unit ${unitId} does not exist`);
    }
  }

  handleCall(context: CallContext): Hex {
    const selector = selectorOfCalldata(context.data);
    if (selector === undefined || !MEMBERSHIP_SELECTORS.has(selector)) {
      throw new CollaboratorError("UNSUPPORTED_CALL", `Membership registry has no function for ${context.data}`);
    }

    const call = decodeFunctionData({ abi: membershipAbi, data: context.data });
    switch (call.functionName) {
      case "totalSupply":
        return encodeFunctionResult({
          abi: membershipAbi,
          functionName: "totalSupply",
          result: this.totalSupply(),
        });
      case "ownerOf":
        return encodeFunctionResult({
          abi: membershipAbi,
          functionName: "ownerOf",
          result: this.ownerOf(call.args[0]) ?? ZERO_ADDRESS,
        });
      case "burn":
        this.burn(context.caller, call.args[0]);
        return "0x";
    }
  }

  snapshot(): RegistrySnapshot {
    return { owners: new Map(this.owners), nextId: this.nextId };
  }

  restore(snapshot: RegistrySnapshot): void {
    this.owners = new Map(snapshot.owners);
    this.nextId = snapshot.nextId;
  }
}
