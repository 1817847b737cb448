/**
 * ExecutorClient — typed calls into a deployed executor.
 *
 * Every method encodes calldata with viem and decodes the result. Writes
 * are top-level transactions from the client's sender; view reads go
 * through a read-only call that is never logged or committed.
 *
 * Design:
 * - Namespace grouping: client.timelock, client.treasury
 * - `as(sender)` returns a client bound to another caller
 * - Failed transactions throw the executor's own error
 */

import { decodeAbiParameters, decodeFunctionResult, encodeFunctionData, parseAbiParameters } from "viem";
import type { LocalChain } from "@hourglass/chain";
import { timelockAbi } from "@hourglass/timelock";
import type { Address, Fingerprint, Hex, TimelockAction } from "@hourglass/types";
import { treasuryAbi } from "./abi.js";

const UINT256 = parseAbiParameters("uint256");

interface Transport {
  readonly chain: LocalChain;
  readonly executor: Address;
  readonly sender: Address;
}

function submit(transport: Transport, data: Hex, value = 0n): Hex {
  return transport.chain.send({
    from: transport.sender,
    to: transport.executor,
    value,
    data,
  });
}

function read(transport: Transport, data: Hex): Hex {
  return transport.chain.call({
    from: transport.sender,
    to: transport.executor,
    value: 0n,
    data,
  });
}

function actionArgs(action: TimelockAction): readonly [Address, bigint, string, Hex, bigint] {
  return [action.target, action.value, action.signature, action.data, action.eta];
}

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * Timelock operations namespace.
 */
export class TimelockNamespace {
  constructor(private readonly transport: Transport) {}

  admin(): Address {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "admin",
      data: read(this.transport, encodeFunctionData({ abi: timelockAbi, functionName: "admin" })),
    });
  }

  pendingAdmin(): Address {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "pendingAdmin",
      data: read(this.transport, encodeFunctionData({ abi: timelockAbi, functionName: "pendingAdmin" })),
    });
  }

  delay(): bigint {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "delay",
      data: read(this.transport, encodeFunctionData({ abi: timelockAbi, functionName: "delay" })),
    });
  }

  isQueued(fingerprint: Fingerprint): boolean {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "queuedTransactions",
      data: read(
        this.transport,
        encodeFunctionData({ abi: timelockAbi, functionName: "queuedTransactions", args: [fingerprint] }),
      ),
    });
  }

  queue(action: TimelockAction): Fingerprint {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "queueTransaction",
      data: submit(
        this.transport,
        encodeFunctionData({ abi: timelockAbi, functionName: "queueTransaction", args: actionArgs(action) }),
      ),
    });
  }

  cancel(action: TimelockAction): void {
    submit(
      this.transport,
      encodeFunctionData({ abi: timelockAbi, functionName: "cancelTransaction", args: actionArgs(action) }),
    );
  }

  /**
   * Execute a queued action. Returns the target's raw return data.
   */
  execute(action: TimelockAction): Hex {
    return decodeFunctionResult({
      abi: timelockAbi,
      functionName: "executeTransaction",
      data: submit(
        this.transport,
        encodeFunctionData({ abi: timelockAbi, functionName: "executeTransaction", args: actionArgs(action) }),
      ),
    });
  }

  acceptAdmin(): void {
    submit(this.transport, encodeFunctionData({ abi: timelockAbi, functionName: "acceptAdmin" }));
  }
}

/**
 * Treasury operations namespace.
 */
export class TreasuryNamespace {
  constructor(private readonly transport: Transport) {}

  redemptionRate(): bigint {
    return this.readUint("redemptionRate");
  }

  totalTreasury(): bigint {
    return this.readUint("totalTreasury");
  }

  allocatedTreasury(): bigint {
    return this.readUint("allocatedTreasury");
  }

  calculateRedemption(): bigint {
    return this.readUint("calculateRedemption");
  }

  setRedemptionRate(rate: bigint): void {
    submit(
      this.transport,
      encodeFunctionData({ abi: treasuryAbi, functionName: "setRedemptionRate", args: [rate] }),
    );
  }

  /**
   * Redeem a unit held by the sender. Returns the amount paid out.
   */
  redeem(unitId: bigint): bigint {
    return decodeFunctionResult({
      abi: treasuryAbi,
      functionName: "redeemForETH",
      data: submit(
        this.transport,
        encodeFunctionData({ abi: treasuryAbi, functionName: "redeemForETH", args: [unitId] }),
      ),
    });
  }

  /** Send plain value to the executor. */
  deposit(amount: bigint): void {
    submit(this.transport, "0x", amount);
  }

  private readUint(
    functionName: "redemptionRate" | "totalTreasury" | "allocatedTreasury" | "calculateRedemption",
  ): bigint {
    const data = read(this.transport, encodeFunctionData({ abi: treasuryAbi, functionName }));
    const [value] = decodeAbiParameters(UINT256, data);
    return value;
  }
}

// =============================================================================
// Client
// =============================================================================

export class ExecutorClient {
  readonly timelock: TimelockNamespace;
  readonly treasury: TreasuryNamespace;
  private readonly transport: Transport;

  constructor(chain: LocalChain, executor: Address, sender: Address) {
    this.transport = { chain, executor, sender };
    this.timelock = new TimelockNamespace(this.transport);
    this.treasury = new TreasuryNamespace(this.transport);
  }

  get sender(): Address {
    return this.transport.sender;
  }

  /**
   * A client for the same executor that sends from another address.
   */
  as(sender: Address): ExecutorClient {
    return new ExecutorClient(this.transport.chain, this.transport.executor, sender);
  }
}
