/**
 * Runtime Type Guards
 *
 * Narrowing functions for Hourglass domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized actions, subscriber payloads, caught errors).
 */

import type { Address, Hex } from "./primitives.js";
import type { TimelockAction } from "./action.js";
import type { ExecutorNotification } from "./notification.js";
import { HourglassError } from "./errors.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_PATTERN = /^0x([0-9a-fA-F]{2})*$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** Even-length hex only: "0x" is valid (empty bytes), "0x1" is not. */
export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isUint(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Action guards
// =============================================================================

export function isTimelockAction(value: unknown): value is TimelockAction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.target) &&
    isUint(v.value) &&
    typeof v.signature === "string" &&
    isHex(v.data) &&
    isUint(v.eta)
  );
}

// =============================================================================
// Notification guards
// =============================================================================

export function isExecutorNotification(value: unknown): value is ExecutorNotification {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.type) {
    case "NewAdmin":
      return isAddress(v.admin);
    case "NewPendingAdmin":
      return isAddress(v.pendingAdmin);
    case "NewDelay":
      return isUint(v.delay);
    case "QueueTransaction":
    case "CancelTransaction":
    case "ExecuteTransaction":
      return isHex(v.fingerprint) && isTimelockAction(v);
    case "NewRedemptionRate":
      return isUint(v.rate);
    case "Redeem":
      return isAddress(v.holder) && isUint(v.unitId) && isUint(v.amount);
    default:
      return false;
  }
}

// =============================================================================
// Error guards
// =============================================================================

export function isHourglassError(value: unknown): value is HourglassError {
  return value instanceof HourglassError;
}
