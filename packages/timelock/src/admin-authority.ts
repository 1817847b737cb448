/**
 * AdminAuthority — admin identity, pending admin and delay.
 *
 * Delay and pending-admin changes are gated to the executor itself: the
 * only way to produce that caller is an executed timelock action whose
 * target is the executor. Admin transfer is two-step; the candidate must
 * accept, so a mistyped address can never lock the executor out.
 */

import type { Journaled } from "@hourglass/chain";
import {
  AuthorizationError,
  BoundsError,
  sameAddress,
  ZERO_ADDRESS,
} from "@hourglass/types";
import type { Address, NotificationSink } from "@hourglass/types";
import { MAXIMUM_DELAY, MINIMUM_DELAY } from "./constants.js";

export interface AdminState {
  readonly admin: Address;
  readonly pendingAdmin: Address;
  readonly delay: bigint;
}

export interface AdminAuthorityOptions {
  /** The executor's own address */
  readonly self: Address;
  readonly admin: Address;
  readonly delay: bigint;
  readonly sink: NotificationSink;
}

/**
 * @throws BoundsError if the delay is outside [MINIMUM_DELAY, MAXIMUM_DELAY]
 */
export function assertDelayInBounds(delay: bigint): void {
  if (delay < MINIMUM_DELAY) {
    throw new BoundsError(
      "DELAY_TOO_SHORT",
      `Delay must be at least ${MINIMUM_DELAY} seconds, got ${delay}`,
    );
  }
  if (delay > MAXIMUM_DELAY) {
    throw new BoundsError(
      "DELAY_TOO_LONG",
      `Delay must not exceed ${MAXIMUM_DELAY} seconds, got ${delay}`,
    );
  }
}

export class AdminAuthority implements Journaled<AdminState> {
  readonly self: Address;
  private readonly sink: NotificationSink;
  private state: AdminState;

  constructor(options: AdminAuthorityOptions) {
    assertDelayInBounds(options.delay);
    this.self = options.self;
    this.sink = options.sink;
    this.state = {
      admin: options.admin,
      pendingAdmin: ZERO_ADDRESS,
      delay: options.delay,
    };
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get admin(): Address {
    return this.state.admin;
  }

  /** ZERO_ADDRESS when no transfer is pending. */
  get pendingAdmin(): Address {
    return this.state.pendingAdmin;
  }

  get delay(): bigint {
    return this.state.delay;
  }

  requireAdmin(caller: Address): void {
    if (!sameAddress(caller, this.state.admin)) {
      throw new AuthorizationError("NOT_ADMIN", `Caller ${caller} is not the admin`);
    }
  }

  // ─── Self-gated setters ─────────────────────────────────────────────

  setDelay(caller: Address, newDelay: bigint): void {
    this.requireSelf(caller, "setDelay");
    assertDelayInBounds(newDelay);

    this.state = { ...this.state, delay: newDelay };
    this.sink.emit(this.self, { type: "NewDelay", delay: newDelay });
  }

  /**
   * Any address is accepted, including ZERO_ADDRESS (clears the pending
   * transfer).
   */
  setPendingAdmin(caller: Address, candidate: Address): void {
    this.requireSelf(caller, "setPendingAdmin");

    this.state = { ...this.state, pendingAdmin: candidate };
    this.sink.emit(this.self, { type: "NewPendingAdmin", pendingAdmin: candidate });
  }

  // ─── Two-step transfer ──────────────────────────────────────────────

  acceptAdmin(caller: Address): void {
    const pending = this.state.pendingAdmin;
    if (sameAddress(pending, ZERO_ADDRESS) || !sameAddress(caller, pending)) {
      throw new AuthorizationError(
        "NOT_PENDING_ADMIN",
        `Caller ${caller} is not the pending admin`,
      );
    }

    this.state = { ...this.state, admin: caller, pendingAdmin: ZERO_ADDRESS };
    this.sink.emit(this.self, { type: "NewAdmin", admin: caller });
  }

  // ─── Journal ────────────────────────────────────────────────────────

  snapshot(): AdminState {
    return this.state;
  }

  restore(snapshot: AdminState): void {
    this.state = snapshot;
  }

  // ─── Private ────────────────────────────────────────────────────────

  private requireSelf(caller: Address, operation: string): void {
    if (!sameAddress(caller, this.self)) {
      throw new AuthorizationError(
        "NOT_SELF",
        `${operation} must be called by the executor itself, not ${caller}`,
      );
    }
  }
}
