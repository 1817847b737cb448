/**
 * @hourglass/ledger — Types for the native-value ledger.
 *
 * Rules:
 * - Balances are uint256 bigints keyed by lower-cased address
 * - Fail-closed: an invalid transfer throws, never partially applies
 */

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Point-in-time copy of every balance. Restoring it discards all
 * movements made after it was taken.
 */
export interface LedgerSnapshot {
  readonly balances: ReadonlyMap<string, bigint>;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_AMOUNT";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
