/**
 * HashRegistry — the set of queued action fingerprints.
 *
 * A fingerprint that was never queued and one that has already executed
 * both read as "not queued"; neither is kept in the set.
 */

import type { Journaled } from "@hourglass/chain";
import type { Fingerprint } from "@hourglass/types";

export type HashRegistrySnapshot = ReadonlySet<string>;

export class HashRegistry implements Journaled<HashRegistrySnapshot> {
  private queued = new Set<string>();

  isQueued(fingerprint: Fingerprint): boolean {
    return this.queued.has(fingerprint.toLowerCase());
  }

  set(fingerprint: Fingerprint, queued: boolean): void {
    const key = fingerprint.toLowerCase();
    if (queued) {
      this.queued.add(key);
    } else {
      this.queued.delete(key);
    }
  }

  snapshot(): HashRegistrySnapshot {
    return new Set(this.queued);
  }

  restore(snapshot: HashRegistrySnapshot): void {
    this.queued = new Set(snapshot);
  }
}
