/**
 * Identity Types
 *
 * Every participant (user, vault, escrow, relay, oracle) is identified by
 * a 20-byte hex address. The zero address stands for "nobody": it is the
 * counterparty of mint and burn share movements.
 */

/**
 * A 0x-prefixed, 20-byte hex address.
 * Structurally identical to viem's `Address`, so values flow between the two.
 */
export type Address = `0x${string}`;

/**
 * A 0x-prefixed hex string of arbitrary length (hashes, signatures, ABI data).
 */
export type Hex = `0x${string}`;

/** The null identity. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * True if the address is the null identity, regardless of letter case.
 */
export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === ZERO_ADDRESS;
}
