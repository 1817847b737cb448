/**
 * @hourglass/event-store — In-memory NotificationStore implementation.
 *
 * Stores records in a plain array. Journaled: the chain host snapshots
 * it at the start of every frame and truncates it back when the frame
 * reverts, so notifications of a failed transaction never survive.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read
 * - Subscribers are dispatched from commit(), never from append()
 * - No durability guarantees
 */

import { isAddress, isExecutorNotification } from "@hourglass/types";
import type { Address, ExecutorNotification } from "@hourglass/types";
import type {
  IntegrityResult,
  NotificationHandler,
  NotificationStore,
  ReadOptions,
  StoredNotification,
  Subscription,
  UnhashedNotification,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeNotificationHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryNotificationStoreOptions {
  /** Chain time source stamped on every record */
  readonly now: () => bigint;
}

export interface NotificationStoreSnapshot {
  readonly length: number;
  readonly lastHash: string;
}

export class InMemoryNotificationStore implements NotificationStore {
  private readonly _now: () => bigint;
  private readonly _log: StoredNotification[] = [];
  private readonly _subscribers = new Set<NotificationHandler>();
  private _lastHash: string = GENESIS_HASH;
  /** Number of records already delivered to subscribers */
  private _dispatched = 0;

  constructor(options: InMemoryNotificationStoreOptions) {
    this._now = options.now;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  emit(emitter: Address, notification: ExecutorNotification): void {
    this.append(emitter, notification);
  }

  append(emitter: Address, notification: ExecutorNotification): StoredNotification {
    if (!isAddress(emitter) || !isExecutorNotification(notification)) {
      throw new EventStoreError(
        "INVALID_NOTIFICATION",
        `Malformed notification from ${String(emitter)}`,
      );
    }
    const base: UnhashedNotification = {
      notification,
      emitter,
      position: this._log.length + 1,
      blockTime: this._now(),
    };

    const previousHash = this._lastHash;
    const hash = computeNotificationHash(base, previousHash);
    const stored: StoredNotification = { ...base, previousHash, hash };

    this._log.push(stored);
    this._lastHash = hash;
    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(options?: ReadOptions): readonly StoredNotification[] {
    const fromPosition = options?.fromPosition ?? 1;
    if (fromPosition < 1) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `fromPosition must be >= 1, got ${fromPosition}`,
      );
    }

    let result = this._log.filter((r) => r.position >= fromPosition);

    const type = options?.type;
    if (type !== undefined) {
      result = result.filter((r) => r.notification.type === type);
    }

    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }

    return result;
  }

  position(): number {
    return this._log.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: NotificationHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): IntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Journal ────────────────────────────────────────────────────────

  snapshot(): NotificationStoreSnapshot {
    return { length: this._log.length, lastHash: this._lastHash };
  }

  restore(snapshot: NotificationStoreSnapshot): void {
    this._log.length = snapshot.length;
    this._lastHash = snapshot.lastHash;
  }

  /**
   * Deliver every record appended since the last commit. A throwing
   * subscriber does not stop delivery; the first error is rethrown after
   * every record has reached every subscriber.
   */
  commit(): void {
    const errors: unknown[] = [];
    while (this._dispatched < this._log.length) {
      const record = this._log[this._dispatched];
      this._dispatched += 1;
      if (record === undefined) continue;
      for (const handler of this._subscribers) {
        try {
          handler(record);
        } catch (error) {
          errors.push(error);
        }
      }
    }
    if (errors.length > 0) {
      throw errors[0];
    }
  }
}
