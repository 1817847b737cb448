import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address, Hex, TimelockAction } from "@hourglass/types";
import { ArithmeticError } from "@hourglass/types";
import { fingerprintOf } from "../src/fingerprint.js";
import { callPayload, selectorOf } from "../src/call-payload.js";
import { action, TARGET } from "./helpers.js";

const arbAddress = fc
  .hexaString({ minLength: 40, maxLength: 40 })
  .map((hex): Address => `0x${hex.toLowerCase()}`);

const arbBytes = fc
  .uint8Array({ maxLength: 64 })
  .map((bytes): Hex => `0x${Buffer.from(bytes).toString("hex")}`);

const arbUint = fc.bigInt({ min: 0n, max: 2n ** 256n - 1n });

const arbAction: fc.Arbitrary<TimelockAction> = fc.record({
  target: arbAddress,
  value: arbUint,
  signature: fc.string({ maxLength: 40 }),
  data: arbBytes,
  eta: arbUint,
});

describe("fingerprintOf", () => {
  it("returns a 32-byte hex string", () => {
    expect(fingerprintOf(action())).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it("is a pure function of the five fields", () => {
    fc.assert(
      fc.property(arbAction, (a) => {
        expect(fingerprintOf(a)).toBe(fingerprintOf({ ...a }));
      }),
    );
  });

  it("changes when any single field changes", () => {
    const base = action({ value: 5n, signature: "setDelay(uint256)", data: "0x01" });
    const variants: TimelockAction[] = [
      { ...base, target: "0x0000000000000000000000000000000000007a68" },
      { ...base, value: 6n },
      { ...base, signature: "setDelay(uint128)" },
      { ...base, data: "0x02" },
      { ...base, eta: base.eta + 1n },
    ];

    const fingerprints = new Set([base, ...variants].map(fingerprintOf));
    expect(fingerprints.size).toBe(6);
  });

  it("distinguishes value and eta in property runs", () => {
    fc.assert(
      fc.property(arbAction, arbUint, (a, other) => {
        fc.pre(other !== a.value);
        expect(fingerprintOf({ ...a, value: other })).not.toBe(fingerprintOf(a));
      }),
    );
  });

  it("rejects a negative value", () => {
    expect(() => fingerprintOf(action({ value: -1n }))).toThrow(ArithmeticError);
  });
});

describe("callPayload", () => {
  it("passes data through when the signature is empty", () => {
    expect(callPayload({ signature: "", data: "0xdeadbeef" })).toBe("0xdeadbeef");
  });

  it("prefixes the selector of the signature", () => {
    const amount = "0000000000000000000000000000000000000000000000000000000000000001";
    const to = `000000000000000000000000${TARGET.slice(2)}`;
    expect(callPayload({ signature: "transfer(address,uint256)", data: `0x${to}${amount}` })).toBe(
      `0xa9059cbb${to}${amount}`,
    );
  });

  it("computes well-known selectors", () => {
    expect(selectorOf("transfer(address,uint256)")).toBe("0xa9059cbb");
    expect(selectorOf("balanceOf(address)")).toBe("0x70a08231");
  });

  it("sends just the selector when data is empty", () => {
    expect(callPayload({ signature: "balanceOf(address)", data: "0x" })).toBe("0x70a08231");
  });
});
