/**
 * EIP-712 typed data for withdrawal requests.
 */

import { hashTypedData } from "viem";
import type { TypedDataDomain } from "viem";
import type { Address, Hex } from "@shareport/types";
import type { WithdrawalRequest } from "./types.js";

export const WITHDRAWAL_TYPES = {
  WithdrawalRequest: [
    { name: "owner", type: "address" },
    { name: "to", type: "address" },
    { name: "shares", type: "uint256" },
    { name: "minAssets", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "expirationTime", type: "uint256" },
  ],
} as const;

export const WITHDRAWAL_PRIMARY_TYPE = "WithdrawalRequest";

export function withdrawalDomain(
  name: string,
  version: string,
  chainId: number,
  verifyingContract: Address,
): TypedDataDomain {
  return { name, version, chainId, verifyingContract };
}

/**
 * Everything a signer or verifier needs for one request.
 */
export function withdrawalTypedData(domain: TypedDataDomain, request: WithdrawalRequest) {
  return {
    domain,
    types: WITHDRAWAL_TYPES,
    primaryType: WITHDRAWAL_PRIMARY_TYPE,
    message: {
      owner: request.owner,
      to: request.to,
      shares: request.shares,
      minAssets: request.minAssets,
      nonce: request.nonce,
      expirationTime: request.expirationTime,
    },
  } as const;
}

export function hashWithdrawalRequest(domain: TypedDataDomain, request: WithdrawalRequest): Hex {
  return hashTypedData(withdrawalTypedData(domain, request));
}
