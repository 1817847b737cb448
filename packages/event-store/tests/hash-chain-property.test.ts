/**
 * Property tests for the notification hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@hourglass/types";
import { InMemoryNotificationStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";

const EMITTER: Address = "0x2222222222222222222222222222222222222222";

const arbRate = fc.bigInt({ min: 0n, max: 10_000n });

describe("hash chain properties", () => {
  it("any sequence of appends verifies", () => {
    fc.assert(
      fc.property(fc.array(arbRate, { maxLength: 30 }), (rates) => {
        const store = new InMemoryNotificationStore({ now: () => 0n });
        for (const rate of rates) {
          store.append(EMITTER, { type: "NewRedemptionRate", rate });
        }
        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(rates.length);
      }),
    );
  });

  it("tampering with any single record is detected", () => {
    fc.assert(
      fc.property(
        fc.array(arbRate, { minLength: 1, maxLength: 20 }),
        fc.nat(),
        (rates, pick) => {
          const store = new InMemoryNotificationStore({ now: () => 0n });
          for (const rate of rates) {
            store.append(EMITTER, { type: "NewRedemptionRate", rate });
          }
          const records = [...store.read()];
          const index = pick % records.length;
          const target = records[index];
          if (target === undefined) return;
          records[index] = {
            ...target,
            notification: { type: "NewRedemptionRate", rate: 10_001n },
          };

          expect(verifyHashChain(records).valid).toBe(false);
        },
      ),
    );
  });
});
