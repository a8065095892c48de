/**
 * @shareport/vault — Errors.
 *
 * One error class per component family. Codes are stable and surface to
 * callers unchanged.
 */

import type { ErrorCategory } from "@shareport/types";
import { ShareportError } from "@shareport/types";

// =============================================================================
// Vault
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INVALID_ARRAY_LENGTHS"
  | "EMPTY_BATCH"
  | "UNSUPPORTED_OPERATION"
  | "EXCEEDED_MAX_WITHDRAW"
  | "EXCEEDED_MAX_REDEEM"
  | "INSUFFICIENT_OUTPUT_ASSETS"
  | "INSUFFICIENT_SHARES"
  | "INSUFFICIENT_SHARE_ALLOWANCE";

const VAULT_CATEGORIES: Record<VaultErrorCode, ErrorCategory> = {
  UNAUTHORIZED: "authorization",
  INVALID_AMOUNT: "validation",
  INVALID_ARRAY_LENGTHS: "validation",
  EMPTY_BATCH: "validation",
  UNSUPPORTED_OPERATION: "validation",
  EXCEEDED_MAX_WITHDRAW: "policy",
  EXCEEDED_MAX_REDEEM: "policy",
  INSUFFICIENT_OUTPUT_ASSETS: "policy",
  INSUFFICIENT_SHARES: "policy",
  INSUFFICIENT_SHARE_ALLOWANCE: "policy",
};

export class VaultError extends ShareportError<VaultErrorCode> {
  constructor(code: VaultErrorCode, message: string) {
    super(code, VAULT_CATEGORIES[code], message);
    this.name = "VaultError";
  }
}

// =============================================================================
// Escrow
// =============================================================================

export type EscrowErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "EMPTY_BATCH"
  | "DEPOSIT_NOT_FOUND"
  | "DEPOSIT_NOT_PENDING"
  | "DEPOSIT_NOT_RECLAIMABLE";

const ESCROW_CATEGORIES: Record<EscrowErrorCode, ErrorCategory> = {
  UNAUTHORIZED: "authorization",
  INVALID_AMOUNT: "validation",
  EMPTY_BATCH: "validation",
  DEPOSIT_NOT_FOUND: "validation",
  DEPOSIT_NOT_PENDING: "state",
  DEPOSIT_NOT_RECLAIMABLE: "state",
};

export class EscrowError extends ShareportError<EscrowErrorCode> {
  constructor(code: EscrowErrorCode, message: string) {
    super(code, ESCROW_CATEGORIES[code], message);
    this.name = "EscrowError";
  }
}

// =============================================================================
// Signed withdrawals
// =============================================================================

export type WithdrawalErrorCode =
  | "UNAUTHORIZED"
  | "EMPTY_BATCH"
  | "WITHDRAWAL_REQUEST_EXPIRED"
  | "WITHDRAW_NONCE_REUSE"
  | "WITHDRAW_INVALID_SIGNATURE";

const WITHDRAWAL_CATEGORIES: Record<WithdrawalErrorCode, ErrorCategory> = {
  UNAUTHORIZED: "authorization",
  EMPTY_BATCH: "validation",
  WITHDRAWAL_REQUEST_EXPIRED: "state",
  WITHDRAW_NONCE_REUSE: "state",
  WITHDRAW_INVALID_SIGNATURE: "authorization",
};

export class WithdrawalError extends ShareportError<WithdrawalErrorCode> {
  constructor(code: WithdrawalErrorCode, message: string) {
    super(code, WITHDRAWAL_CATEGORIES[code], message);
    this.name = "WithdrawalError";
  }
}
