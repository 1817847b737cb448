/**
 * @hourglass/chain — Core types for the local chain host.
 *
 * The host is the "platform" the executor runs on. It supplies:
 * - a monotonic clock
 * - native value balances
 * - an invoke primitive (call + value, success/failure outcome)
 * - atomic, nestable transaction frames with rollback
 *
 * Design principles:
 * - Strictly serialized: one call stack, no parallelism
 * - A frame either commits fully or restores every journaled participant
 * - Contracts are plain objects implementing CallHandler
 */

import type { Address, Hex } from "@hourglass/types";

// =============================================================================
// Clock
// =============================================================================

/** Source of the current time in unix seconds. */
export interface Clock {
  now(): bigint;
}

// =============================================================================
// Calls
// =============================================================================

/**
 * What a contract sees when it is called.
 */
export interface CallContext {
  /** Immediate caller (msg.sender) */
  readonly caller: Address;

  /** Address of the contract being called */
  readonly self: Address;

  /** Native value sent with the call, already credited to `self` */
  readonly value: bigint;

  /** Raw calldata */
  readonly data: Hex;
}

/**
 * A contract deployed on the chain. Throwing reverts the call frame.
 */
export interface CallHandler {
  handleCall(context: CallContext): Hex;
}

export interface InvokeRequest {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
}

/**
 * Outcome of the invoke primitive. A failed call has already been
 * rolled back when this is returned.
 */
export type InvokeResult =
  | { readonly success: true; readonly returnData: Hex }
  | { readonly success: false; readonly returnData: Hex; readonly error: unknown };

/**
 * The slice of the chain a contract needs while running.
 */
export interface ChainHost {
  now(): bigint;
  balanceOf(address: Address): bigint;
  invoke(request: InvokeRequest): InvokeResult;
  atomic<T>(fn: () => T): T;
  track<TSnapshot>(participant: Journaled<TSnapshot>): void;
}

// =============================================================================
// Journal
// =============================================================================

/**
 * State that must roll back with the transaction frame it changed in.
 *
 * `commit` runs once the outermost frame has committed, for side effects
 * that must never be observed from a reverted transaction.
 */
export interface Journaled<TSnapshot> {
  snapshot(): TSnapshot;
  restore(snapshot: TSnapshot): void;
  commit?(): void;
}

// =============================================================================
// Logging
// =============================================================================

export type TransactionStatus = "committed" | "reverted";

/**
 * One top-level transaction, as reported to the log callback.
 */
export interface TransactionLogEntry {
  readonly from: Address;
  readonly to: Address;
  /** First four bytes of calldata, or "0x" for a plain transfer */
  readonly selector: Hex;
  readonly value: bigint;
  readonly status: TransactionStatus;
  readonly errorCode?: string;
  readonly durationMs: number;
}

// =============================================================================
// Errors
// =============================================================================

export type ChainErrorCode = "ADDRESS_IN_USE" | "CLOCK_REGRESSION" | "POST_COMMIT_FAILED";

export class ChainError extends Error {
  public readonly code: ChainErrorCode;
  constructor(code: ChainErrorCode, message: string) {
    super(message);
    this.name = "ChainError";
    this.code = code;
  }
}

/**
 * Raised after a transaction has committed, when a commit hook or the log
 * callback threw. The state changes stand; nothing is rolled back.
 */
export class PostCommitError extends ChainError {
  public readonly failures: readonly unknown[];
  constructor(failures: readonly unknown[]) {
    const first = failures[0];
    const reason = first instanceof Error ? first.message : String(first);
    super("POST_COMMIT_FAILED", `${failures.length} post-commit handler(s) failed: ${reason}`);
    this.name = "PostCommitError";
    this.failures = failures;
  }
}
