/**
 * Vault Types
 *
 * Configuration and record types for share vaults, the deposit escrow and
 * signed withdrawals.
 *
 * Rules:
 * - All types are readonly
 * - Amounts, prices, timestamps and nonces are bigint
 * - Addresses are checksummed once at the component boundary
 */

import type { Address, AuthorizationOracle, Hex, ValuationSource } from "@shareport/types";
import type { AssetRelay, AssetToken } from "@shareport/runtime";

// =============================================================================
// Vaults
// =============================================================================

export interface ShareVaultConfig {
  /** The vault's own address; also the custody account for its assets */
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly asset: AssetToken;
  readonly relay: AssetRelay;
  readonly authorization: AuthorizationOracle;
  /** Default: the asset balance held in vault custody */
  readonly valuation?: ValuationSource;
}

export interface GatedDepositVaultConfig extends ShareVaultConfig {
  readonly escrowAddress: Address;
  /** How long a deposit waits before its depositor may reclaim it */
  readonly depositExpirationSeconds: bigint;
}

/**
 * The privileged mint the escrow calls when it accepts deposits.
 */
export interface EscrowedShareMinter {
  readonly address: Address;
  previewDeposit(assets: bigint): bigint;
  mintShares(caller: Address, receiver: Address, assets: bigint): bigint;
  batchMintShares(caller: Address, receivers: readonly Address[], assets: readonly bigint[]): bigint[];
}

// =============================================================================
// Escrow
// =============================================================================

export type DepositState = "PENDING" | "ACCEPTED" | "REFUNDED";

export interface PendingDeposit {
  readonly id: Hex;
  readonly depositor: Address;
  readonly recipient: Address;
  readonly assetAmount: bigint;
  readonly expirationTime: bigint;
  readonly state: DepositState;
  readonly roundAtCreation: number;
  readonly createdAt: bigint;
}

export interface DepositEscrowConfig {
  readonly address: Address;
  readonly vault: EscrowedShareMinter;
  readonly asset: AssetToken;
  readonly authorization: AuthorizationOracle;
  readonly expirationSeconds: bigint;
}

// =============================================================================
// Signed withdrawals
// =============================================================================

/**
 * What a share owner signs to pre-approve a withdrawal.
 */
export interface WithdrawalRequest {
  readonly owner: Address;
  readonly to: Address;
  readonly shares: bigint;
  readonly minAssets: bigint;
  readonly nonce: bigint;
  readonly expirationTime: bigint;
}

export interface SignedWithdrawal {
  readonly request: WithdrawalRequest;
  readonly signature: Hex;
}

/**
 * The managed redeem the authorizer executes.
 */
export interface ManagedRedeemer {
  readonly address: Address;
  redeem(caller: Address, shares: bigint, receiver: Address, owner: Address, minAssets?: bigint): bigint;
}

export interface WithdrawalAuthorizerConfig {
  readonly address: Address;
  readonly vault: ManagedRedeemer;
  readonly authorization: AuthorizationOracle;
  /** EIP-712 domain name */
  readonly domainName: string;
  /** EIP-712 domain version */
  readonly domainVersion: string;
}
