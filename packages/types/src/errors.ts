/**
 * Error Taxonomy
 *
 * Every rejection in Hourglass is synchronous and fail-closed: the whole
 * transaction rolls back and the caller receives one of these errors.
 * `kind` groups errors by taxonomy; `code` is the machine-readable reason.
 */

import type { Hex } from "./primitives.js";

export type ErrorKind =
  | "authorization"
  | "bounds"
  | "precondition"
  | "external-call"
  | "arithmetic";

export class HourglassError<TCode extends string = string> extends Error {
  public readonly kind: ErrorKind;
  public readonly code: TCode;
  constructor(kind: ErrorKind, code: TCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "HourglassError";
    this.kind = kind;
    this.code = code;
  }
}

// =============================================================================
// Authorization
// =============================================================================

export type AuthorizationErrorCode =
  | "NOT_ADMIN"
  | "NOT_PENDING_ADMIN"
  | "NOT_SELF"
  | "NOT_UNIT_OWNER";

export class AuthorizationError extends HourglassError<AuthorizationErrorCode> {
  constructor(code: AuthorizationErrorCode, message: string) {
    super("authorization", code, message);
    this.name = "AuthorizationError";
  }
}

// =============================================================================
// Bounds
// =============================================================================

export type BoundsErrorCode = "DELAY_TOO_SHORT" | "DELAY_TOO_LONG";

export class BoundsError extends HourglassError<BoundsErrorCode> {
  constructor(code: BoundsErrorCode, message: string) {
    super("bounds", code, message);
    this.name = "BoundsError";
  }
}

// =============================================================================
// Preconditions
// =============================================================================

export type PreconditionErrorCode =
  | "ETA_TOO_EARLY"
  | "NOT_QUEUED"
  | "NOT_MATURED"
  | "STALE";

export class PreconditionError extends HourglassError<PreconditionErrorCode> {
  constructor(code: PreconditionErrorCode, message: string) {
    super("precondition", code, message);
    this.name = "PreconditionError";
  }
}

// =============================================================================
// External calls
// =============================================================================

export type ExternalCallErrorCode =
  | "CALL_REVERTED"
  | "BURN_FAILED"
  | "TRANSFER_FAILED";

export class ExternalCallError extends HourglassError<ExternalCallErrorCode> {
  /** Raw data returned by the failed invocation */
  public readonly returnData: Hex;
  constructor(
    code: ExternalCallErrorCode,
    message: string,
    returnData: Hex,
    cause?: unknown,
  ) {
    super("external-call", code, message, cause);
    this.name = "ExternalCallError";
    this.returnData = returnData;
  }
}

// =============================================================================
// Arithmetic
// =============================================================================

export type ArithmeticErrorCode = "DIVISION_BY_ZERO" | "OVERFLOW" | "UNDERFLOW";

export class ArithmeticError extends HourglassError<ArithmeticErrorCode> {
  constructor(code: ArithmeticErrorCode, message: string) {
    super("arithmetic", code, message);
    this.name = "ArithmeticError";
  }
}
