/**
 * LocalChain — In-process execution host.
 *
 * Provides the platform guarantees the executor relies on:
 * - Atomic frames: `atomic(fn)` snapshots every tracked participant,
 *   restores them all if `fn` throws, and nests freely
 * - Invoke primitive: moves value, dispatches to the target contract,
 *   and reports success/failure instead of throwing
 * - Top-level transactions via `send`, which throw on failure and are
 *   reported to the optional log callback
 * - Read-only calls via `call`, which always roll back
 *
 * Properties:
 * - Synchronous and single-threaded; re-entry happens only through invoke
 * - Commit hooks run once, after the outermost frame commits; a hook
 *   failure never reverts the transaction
 * - Calls to addresses without a contract succeed and return "0x"
 */

import { encodeErrorResult, parseAbi, size, slice } from "viem";
import { ValueLedger } from "@hourglass/ledger";
import { isHourglassError } from "@hourglass/types";
import type { Address, Hex } from "@hourglass/types";
import type {
  CallHandler,
  ChainHost,
  Clock,
  InvokeRequest,
  InvokeResult,
  Journaled,
  TransactionLogEntry,
  TransactionStatus,
} from "./types.js";
import { ChainError, PostCommitError } from "./types.js";

const REVERT_ABI = parseAbi(["error Error(string message)"]);

export interface LocalChainOptions {
  readonly clock: Clock;
  readonly ledger?: ValueLedger;
  readonly log?: (entry: TransactionLogEntry) => void;
}

interface Participant {
  checkpoint(): () => void;
  commit(): void;
}

/**
 * Encode a thrown value as an EVM `Error(string)` revert payload.
 */
export function encodeRevertReason(error: unknown): Hex {
  const message = error instanceof Error ? error.message : String(error);
  return encodeErrorResult({ abi: REVERT_ABI, errorName: "Error", args: [message] });
}

function selectorOf(data: Hex): Hex {
  return size(data) >= 4 ? slice(data, 0, 4) : "0x";
}

function errorCodeOf(error: unknown): string {
  if (isHourglassError(error)) return error.code;
  if (error instanceof Error) return error.name;
  return "UNKNOWN";
}

export class LocalChain implements ChainHost {
  readonly ledger: ValueLedger;
  private readonly clock: Clock;
  private readonly log: ((entry: TransactionLogEntry) => void) | undefined;
  private readonly contracts = new Map<string, CallHandler>();
  private readonly participants: Participant[] = [];
  private depth = 0;

  constructor(options: LocalChainOptions) {
    this.clock = options.clock;
    this.ledger = options.ledger ?? new ValueLedger();
    this.log = options.log;
    this.track(this.ledger);
  }

  // ─── Environment ────────────────────────────────────────────────────

  now(): bigint {
    return this.clock.now();
  }

  balanceOf(address: Address): bigint {
    return this.ledger.balanceOf(address);
  }

  /**
   * Seed an address with value from outside the system.
   */
  fund(address: Address, amount: bigint): bigint {
    return this.ledger.credit(address, amount);
  }

  // ─── Contracts ──────────────────────────────────────────────────────

  deploy(address: Address, handler: CallHandler): void {
    const key = address.toLowerCase();
    if (this.contracts.has(key)) {
      throw new ChainError("ADDRESS_IN_USE", `A contract is already deployed at ${address}`);
    }
    this.contracts.set(key, handler);
  }

  codeAt(address: Address): CallHandler | undefined {
    return this.contracts.get(address.toLowerCase());
  }

  /**
   * Register state that must roll back with failed frames.
   */
  track<TSnapshot>(participant: Journaled<TSnapshot>): void {
    this.participants.push({
      checkpoint: () => {
        const snapshot = participant.snapshot();
        return () => participant.restore(snapshot);
      },
      commit: () => participant.commit?.(),
    });
  }

  // ─── Frames ─────────────────────────────────────────────────────────

  /**
   * Run `fn` in a frame that rolls back if it throws. When the outermost
   * frame commits, commit hooks run; if any of them throws, the state stays
   * committed and a PostCommitError is raised.
   */
  atomic<T>(fn: () => T): T {
    const result = this.frame(fn);
    if (this.depth === 0) {
      this.throwIfFailed(this.runCommitHooks());
    }
    return result;
  }

  /**
   * The invoke primitive. Never throws on a failed call; the frame has
   * already been rolled back when `success: false` is returned.
   */
  invoke(request: InvokeRequest): InvokeResult {
    let returnData: Hex;
    try {
      returnData = this.frame(() => this.dispatch(request));
    } catch (error) {
      return { success: false, returnData: encodeRevertReason(error), error };
    }
    if (this.depth === 0) {
      this.throwIfFailed(this.runCommitHooks());
    }
    return { success: true, returnData };
  }

  /**
   * A top-level transaction. Throws the original error on failure.
   */
  send(request: InvokeRequest): Hex {
    const startedAt = Date.now();
    let returnData: Hex;
    try {
      returnData = this.frame(() => this.dispatch(request));
    } catch (error) {
      this.report(request, "reverted", startedAt, error);
      throw error;
    }

    const failures: unknown[] = [];
    try {
      this.report(request, "committed", startedAt);
    } catch (error) {
      failures.push(error);
    }
    if (this.depth === 0) {
      failures.push(...this.runCommitHooks());
    }
    this.throwIfFailed(failures);
    return returnData;
  }

  /**
   * A read-only call: dispatches like `send`, then discards every change.
   * Not logged, and commit hooks never run.
   */
  call(request: InvokeRequest): Hex {
    const rollbacks = this.participants.map((p) => p.checkpoint());
    this.depth += 1;
    try {
      return this.dispatch(request);
    } finally {
      this.depth -= 1;
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
    }
  }

  // ─── Private ────────────────────────────────────────────────────────

  private frame<T>(fn: () => T): T {
    const rollbacks = this.participants.map((p) => p.checkpoint());
    this.depth += 1;
    try {
      return fn();
    } catch (error) {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      throw error;
    } finally {
      this.depth -= 1;
    }
  }

  private runCommitHooks(): unknown[] {
    const failures: unknown[] = [];
    for (const participant of this.participants) {
      try {
        participant.commit();
      } catch (error) {
        failures.push(error);
      }
    }
    return failures;
  }

  private throwIfFailed(failures: readonly unknown[]): void {
    if (failures.length > 0) {
      throw new PostCommitError(failures);
    }
  }

  private dispatch(request: InvokeRequest): Hex {
    this.ledger.transfer(request.from, request.to, request.value);

    const handler = this.codeAt(request.to);
    if (handler === undefined) {
      return "0x";
    }

    return handler.handleCall({
      caller: request.from,
      self: request.to,
      value: request.value,
      data: request.data,
    });
  }

  private report(
    request: InvokeRequest,
    status: TransactionStatus,
    startedAt: number,
    error?: unknown,
  ): void {
    if (this.log === undefined) return;

    const entry: TransactionLogEntry = {
      from: request.from,
      to: request.to,
      selector: selectorOf(request.data),
      value: request.value,
      status,
      durationMs: Date.now() - startedAt,
      ...(status === "reverted" ? { errorCode: errorCodeOf(error) } : {}),
    };
    this.log(entry);
  }
}
