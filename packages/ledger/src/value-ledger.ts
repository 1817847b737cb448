/**
 * @hourglass/ledger — Native value balances.
 *
 * Tracks how much native value each address holds. This is the
 * "balance" half of the chain host: the invoke primitive moves value
 * through it and the treasury reads its own holdings from it.
 *
 * API surface:
 * - balanceOf() — Current balance of an address
 * - credit() — Value entering from outside (genesis funding, deposits)
 * - transfer() — Move value between two addresses
 * - snapshot() / restore() — Journal support for atomic rollback
 */

import type { Address } from "@hourglass/types";
import { LedgerError } from "./types.js";
import type { LedgerSnapshot } from "./types.js";
import { assertUint256, checkedAdd } from "./uint-math.js";

function key(address: Address): string {
  return address.toLowerCase();
}

export class ValueLedger {
  private _balances = new Map<string, bigint>();

  balanceOf(address: Address): bigint {
    return this._balances.get(key(address)) ?? 0n;
  }

  /**
   * Add value to an address out of thin air.
   * Only the host uses this, to seed accounts.
   */
  credit(address: Address, amount: bigint): bigint {
    this.assertAmount(amount);
    const next = checkedAdd(this.balanceOf(address), amount);
    this._balances.set(key(address), next);
    return next;
  }

  /**
   * Move `amount` from one address to another.
   * A zero-value transfer always succeeds.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    if (amount === 0n) return;

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${fromBalance}, cannot send ${amount}`,
      );
    }

    this._balances.set(key(from), fromBalance - amount);
    this._balances.set(key(to), checkedAdd(this.balanceOf(to), amount));
  }

  // ─── Journal ─────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return { balances: new Map(this._balances) };
  }

  restore(snapshot: LedgerSnapshot): void {
    this._balances = new Map(snapshot.balances);
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
    }
    assertUint256(amount, "amount");
  }
}
