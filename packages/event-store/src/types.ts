/**
 * @hourglass/event-store — Core types.
 *
 * Defines the append-only, hash-chained log that executor notifications
 * are written to.
 *
 * Design principles:
 * - Records are immutable after append
 * - Positions are 1-based, contiguous, and global
 * - Every record links to its predecessor's hash
 * - Subscribers only ever see committed records
 */

import type {
  Address,
  ExecutorNotification,
  NotificationSink,
  NotificationType,
} from "@hourglass/types";

// =============================================================================
// Stored Notification
// =============================================================================

/**
 * A notification as persisted in the log.
 */
export interface StoredNotification<
  TNotification extends ExecutorNotification = ExecutorNotification,
> {
  /** The notification itself */
  readonly notification: TNotification;

  /** Contract that emitted it */
  readonly emitter: Address;

  /** Position in the log (1-based, monotonically increasing) */
  readonly position: number;

  /** Chain time when it was appended (unix seconds) */
  readonly blockTime: bigint;

  /** Hash of the preceding record, or GENESIS_HASH for position 1 */
  readonly previousHash: string;

  /** sha256 over the canonical record content and previousHash */
  readonly hash: string;
}

/** The fields covered by a record's hash. */
export type UnhashedNotification = Omit<StoredNotification, "hash" | "previousHash">;

// =============================================================================
// Read Options
// =============================================================================

export interface ReadOptions {
  /** Start reading from this position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of records to return. Default: unlimited */
  readonly maxCount?: number;

  /** Only records of this notification type */
  readonly type?: NotificationType;
}

// =============================================================================
// Subscription
// =============================================================================

export type NotificationHandler = (record: StoredNotification) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;
  /** Last position whose hash was recomputed (0 for an empty log) */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Append-only notification log.
 *
 * Invariants:
 * - Records are immutable once appended
 * - Positions are contiguous (1, 2, 3, ...) with no gaps
 * - Subscribers see records in position order, after commit
 */
export interface NotificationStore extends NotificationSink {
  /**
   * Append a notification. Returns the stored, hashed record.
   */
  /**
   * @throws EventStoreError if the emitter or the payload is malformed
   */
  append(emitter: Address, notification: ExecutorNotification): StoredNotification;

  /**
   * Read records in position order.
   *
   * @throws EventStoreError if fromPosition < 1
   */
  read(options?: ReadOptions): readonly StoredNotification[];

  /**
   * Subscribe to newly committed records.
   */
  subscribe(handler: NotificationHandler): Subscription;

  /**
   * Recompute the whole hash chain.
   */
  verifyIntegrity(): IntegrityResult;

  /** Position of the last record, or 0 when empty. */
  position(): number;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_POSITION" | "INVALID_NOTIFICATION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
