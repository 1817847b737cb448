/**
 * @hourglass/timelock — Delay-enforced execution of administrative calls.
 *
 * Provides:
 * - HashRegistry: queued fingerprints
 * - AdminAuthority: admin, two-step transfer, delay bounds
 * - TimelockEngine: queue / cancel / execute
 * - Timelock: the three composed into a chain contract with an ABI surface
 *
 * @packageDocumentation
 */

export { GRACE_PERIOD, MINIMUM_DELAY, MAXIMUM_DELAY } from "./constants.js";

export { fingerprintOf } from "./fingerprint.js";
export { callPayload, selectorOf } from "./call-payload.js";

export { HashRegistry } from "./hash-registry.js";
export type { HashRegistrySnapshot } from "./hash-registry.js";

export { AdminAuthority, assertDelayInBounds } from "./admin-authority.js";
export type { AdminState, AdminAuthorityOptions } from "./admin-authority.js";

export { TimelockEngine } from "./timelock-engine.js";
export type { TimelockEngineOptions } from "./timelock-engine.js";

export { Timelock } from "./timelock.js";
export type { TimelockOptions } from "./timelock.js";

export { timelockAbi, selectorsOf, selectorOfCalldata } from "./abi.js";

export {
  TimelockActionSchema,
  Uint256Schema,
  AddressSchema,
  HexSchema,
  parseTimelockAction,
} from "./schema.js";
export type { TimelockActionInput } from "./schema.js";
