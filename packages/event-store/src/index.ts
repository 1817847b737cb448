/**
 * @hourglass/event-store — Append-only notification log.
 *
 * Provides:
 * - NotificationStore interface (a NotificationSink that keeps history)
 * - InMemoryNotificationStore, journaled for atomic rollback
 * - SHA-256 / JCS hash chain with verification
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredNotification,
  UnhashedNotification,
  ReadOptions,
  NotificationHandler,
  Subscription,
  IntegrityError,
  IntegrityResult,
  NotificationStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeNotificationHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryNotificationStore } from "./in-memory-store.js";
export type {
  InMemoryNotificationStoreOptions,
  NotificationStoreSnapshot,
} from "./in-memory-store.js";
