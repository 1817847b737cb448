/**
 * Notification Types
 *
 * Audit events emitted by the executor. Append-only; the core never reads
 * them back. Discriminated by `type`.
 */

import type { Address, Fingerprint, Hex } from "./primitives.js";

export interface NewAdminNotification {
  readonly type: "NewAdmin";
  readonly admin: Address;
}

export interface NewPendingAdminNotification {
  readonly type: "NewPendingAdmin";
  readonly pendingAdmin: Address;
}

export interface NewDelayNotification {
  readonly type: "NewDelay";
  readonly delay: bigint;
}

/** Queue, cancel and execute all carry the full action plus its fingerprint. */
export interface TransactionNotification {
  readonly type: "QueueTransaction" | "CancelTransaction" | "ExecuteTransaction";
  readonly fingerprint: Fingerprint;
  readonly target: Address;
  readonly value: bigint;
  readonly signature: string;
  readonly data: Hex;
  readonly eta: bigint;
}

export interface NewRedemptionRateNotification {
  readonly type: "NewRedemptionRate";
  readonly rate: bigint;
}

export interface RedeemNotification {
  readonly type: "Redeem";
  readonly holder: Address;
  readonly unitId: bigint;
  readonly amount: bigint;
}

export type ExecutorNotification =
  | NewAdminNotification
  | NewPendingAdminNotification
  | NewDelayNotification
  | TransactionNotification
  | NewRedemptionRateNotification
  | RedeemNotification;

export type NotificationType = ExecutorNotification["type"];

/**
 * Anything that accepts notifications. The executor only ever appends.
 */
export interface NotificationSink {
  emit(emitter: Address, notification: ExecutorNotification): void;
}
