/**
 * @hourglass/chain — In-process chain host.
 *
 * Provides:
 * - LocalChain: contracts, invoke primitive, atomic frames, value ledger
 * - ManualClock
 * - Journaled interface for state that rolls back with a frame
 *
 * @packageDocumentation
 */

export type {
  Clock,
  CallContext,
  CallHandler,
  ChainHost,
  InvokeRequest,
  InvokeResult,
  Journaled,
  TransactionLogEntry,
  TransactionStatus,
  ChainErrorCode,
} from "./types.js";
export { ChainError, PostCommitError } from "./types.js";

export { ManualClock } from "./clock.js";

export { LocalChain, encodeRevertReason } from "./local-chain.js";
export type { LocalChainOptions } from "./local-chain.js";
