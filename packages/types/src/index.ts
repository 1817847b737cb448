/**
 * @hourglass/types — Shared domain types for the Hourglass stack.
 *
 * These types are used across all Hourglass packages:
 * - Address / hex primitives
 * - Timelock actions
 * - Executor notifications
 * - The error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - uint256 quantities are bigint
 */

// Primitives
export type { Address, Hex, Fingerprint } from "./primitives.js";
export { ZERO_ADDRESS, sameAddress } from "./primitives.js";

// Actions
export type { TimelockAction } from "./action.js";

// Notifications
export type {
  ExecutorNotification,
  NotificationType,
  NotificationSink,
  NewAdminNotification,
  NewPendingAdminNotification,
  NewDelayNotification,
  TransactionNotification,
  NewRedemptionRateNotification,
  RedeemNotification,
} from "./notification.js";

// Errors
export {
  HourglassError,
  AuthorizationError,
  BoundsError,
  PreconditionError,
  ExternalCallError,
  ArithmeticError,
} from "./errors.js";
export type {
  ErrorKind,
  AuthorizationErrorCode,
  BoundsErrorCode,
  PreconditionErrorCode,
  ExternalCallErrorCode,
  ArithmeticErrorCode,
} from "./errors.js";

// Runtime type guards
export {
  isAddress,
  isHex,
  isUint,
  isTimelockAction,
  isExecutorNotification,
  isHourglassError,
} from "./guards.js";
