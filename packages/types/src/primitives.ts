/**
 * Primitive Types
 *
 * Identity and byte-string primitives shared by every Hourglass package.
 * Shapes match viem's `Address` and `Hex` so values pass between the two
 * without conversion.
 *
 * Rules:
 * - Addresses are 20-byte, 0x-prefixed hex strings
 * - All uint256 quantities are `bigint`, never `number`
 */

/** A 20-byte account or contract identity. */
export type Address = `0x${string}`;

/** An arbitrary 0x-prefixed byte string. */
export type Hex = `0x${string}`;

/** keccak256 fingerprint of a timelock action (32 bytes). */
export type Fingerprint = Hex;

/** The zero address. Used as "none" for the pending admin. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Address equality ignoring checksum casing.
 */
export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
