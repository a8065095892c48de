/**
 * Address normalization.
 *
 * Balances, roles and nonces are keyed by checksummed addresses, so every
 * address entering the system is normalized once at the boundary.
 */

import { getAddress } from "viem";
import type { Address } from "@shareport/types";
import { isAddress, isZeroAddress } from "@shareport/types";
import { RuntimeError } from "./errors.js";

/**
 * Checksum an address, rejecting malformed input.
 */
export function toAddress(value: string, label = "address"): Address {
  if (!isAddress(value)) {
    throw new RuntimeError("INVALID_ADDRESS", `Invalid ${label}: "${value}"`);
  }
  return getAddress(value);
}

/**
 * Checksum an address and reject the zero address.
 */
export function toNonZeroAddress(value: string, label = "address"): Address {
  const address = toAddress(value, label);
  if (isZeroAddress(address)) {
    throw new RuntimeError("INVALID_ADDRESS", `${label} must not be the zero address`);
  }
  return address;
}
