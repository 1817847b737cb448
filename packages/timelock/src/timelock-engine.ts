/**
 * TimelockEngine — queue, cancel and execute administrative actions.
 *
 * Per-fingerprint lifecycle:
 *
 *   Unqueued → Queued → Executed
 *                ↓  ↑
 *             Cancelled (re-queue with identical fields)
 *
 * Every operation runs inside one atomic frame of the chain host. The
 * queued flag is cleared before the target is invoked, so a re-entrant
 * execute of the same action finds it unqueued; if the invocation fails
 * the frame restores the flag with everything else.
 */

import { checkedAdd } from "@hourglass/ledger";
import type { ChainHost } from "@hourglass/chain";
import { ExternalCallError, PreconditionError } from "@hourglass/types";
import type {
  Address,
  Fingerprint,
  Hex,
  NotificationSink,
  TimelockAction,
  TransactionNotification,
} from "@hourglass/types";
import { GRACE_PERIOD } from "./constants.js";
import { fingerprintOf } from "./fingerprint.js";
import { callPayload } from "./call-payload.js";
import type { HashRegistry } from "./hash-registry.js";
import type { AdminAuthority } from "./admin-authority.js";

export interface TimelockEngineOptions {
  readonly host: ChainHost;
  readonly authority: AdminAuthority;
  readonly registry: HashRegistry;
  readonly sink: NotificationSink;
}

export class TimelockEngine {
  private readonly host: ChainHost;
  private readonly authority: AdminAuthority;
  private readonly registry: HashRegistry;
  private readonly sink: NotificationSink;

  constructor(options: TimelockEngineOptions) {
    this.host = options.host;
    this.authority = options.authority;
    this.registry = options.registry;
    this.sink = options.sink;
  }

  get self(): Address {
    return this.authority.self;
  }

  isQueued(fingerprint: Fingerprint): boolean {
    return this.registry.isQueued(fingerprint);
  }

  /**
   * Queue an action for execution no earlier than its eta.
   *
   * @throws AuthorizationError NOT_ADMIN
   * @throws PreconditionError ETA_TOO_EARLY if eta < now + delay
   */
  queueTransaction(caller: Address, action: TimelockAction): Fingerprint {
    return this.host.atomic(() => {
      this.authority.requireAdmin(caller);

      const earliest = checkedAdd(this.host.now(), this.authority.delay);
      if (action.eta < earliest) {
        throw new PreconditionError(
          "ETA_TOO_EARLY",
          `Estimated execution time ${action.eta} must satisfy the delay (earliest ${earliest})`,
        );
      }

      const fingerprint = fingerprintOf(action);
      this.registry.set(fingerprint, true);
      this.notify("QueueTransaction", fingerprint, action);
      return fingerprint;
    });
  }

  /**
   * Unconditionally clear the queued flag. Cancelling an action that was
   * never queued succeeds and still notifies.
   */
  cancelTransaction(caller: Address, action: TimelockAction): Fingerprint {
    return this.host.atomic(() => {
      this.authority.requireAdmin(caller);

      const fingerprint = fingerprintOf(action);
      this.registry.set(fingerprint, false);
      this.notify("CancelTransaction", fingerprint, action);
      return fingerprint;
    });
  }

  /**
   * Execute a matured, unexpired, queued action and return the target's
   * raw return data.
   *
   * @throws PreconditionError NOT_QUEUED, NOT_MATURED or STALE
   * @throws ExternalCallError CALL_REVERTED when the target call fails
   */
  executeTransaction(caller: Address, action: TimelockAction): Hex {
    return this.host.atomic(() => {
      this.authority.requireAdmin(caller);

      const fingerprint = fingerprintOf(action);
      if (!this.registry.isQueued(fingerprint)) {
        throw new PreconditionError("NOT_QUEUED", `Transaction ${fingerprint} is not queued`);
      }

      const now = this.host.now();
      if (now < action.eta) {
        throw new PreconditionError(
          "NOT_MATURED",
          `Transaction ${fingerprint} has not surpassed its time lock (eta ${action.eta}, now ${now})`,
        );
      }
      if (now > checkedAdd(action.eta, GRACE_PERIOD)) {
        throw new PreconditionError(
          "STALE",
          `Transaction ${fingerprint} is stale (eta ${action.eta}, now ${now})`,
        );
      }

      this.registry.set(fingerprint, false);

      const result = this.host.invoke({
        from: this.self,
        to: action.target,
        value: action.value,
        data: callPayload(action),
      });
      if (!result.success) {
        throw new ExternalCallError(
          "CALL_REVERTED",
          `Transaction ${fingerprint} execution reverted`,
          result.returnData,
          result.error,
        );
      }

      this.notify("ExecuteTransaction", fingerprint, action);
      return result.returnData;
    });
  }

  private notify(
    type: TransactionNotification["type"],
    fingerprint: Fingerprint,
    action: TimelockAction,
  ): void {
    this.sink.emit(this.self, {
      type,
      fingerprint,
      target: action.target,
      value: action.value,
      signature: action.signature,
      data: action.data,
      eta: action.eta,
    });
  }
}
