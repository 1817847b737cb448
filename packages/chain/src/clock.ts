/**
 * Clock for the chain host.
 */

import type { Clock } from "./types.js";
import { ChainError } from "./types.js";

/**
 * A clock that only moves when told to. Never goes backwards.
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start = 0n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) {
      throw new ChainError(
        "CLOCK_REGRESSION",
        `Cannot move clock back from ${this.current} to ${timestamp}`,
      );
    }
    this.current = timestamp;
  }

  advance(seconds: bigint): bigint {
    this.set(this.current + seconds);
    return this.current;
  }
}
