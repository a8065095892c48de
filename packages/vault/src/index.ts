/**
 * @shareport/vault — Share vaults, deposit escrow, signed withdrawals.
 *
 * - ShareVault: hook-gated share token over externally valued assets
 * - ManagedWithdrawVault: operator-only redemptions with slippage floors
 * - GatedDepositVault + DepositEscrow: two-phase deposits
 * - WithdrawalAuthorizer: EIP-712 signed, nonce-protected redemptions
 */

export { ShareVault } from "./share-vault.js";
export { ManagedWithdrawVault } from "./managed-withdraw-vault.js";
export { GatedDepositVault } from "./gated-deposit-vault.js";
export { DepositEscrow } from "./deposit-escrow.js";
export { WithdrawalAuthorizer } from "./withdrawal-authorizer.js";
export { CustodyValuation, ReportedValuation } from "./valuation.js";

export {
  WITHDRAWAL_TYPES,
  WITHDRAWAL_PRIMARY_TYPE,
  withdrawalDomain,
  withdrawalTypedData,
  hashWithdrawalRequest,
} from "./withdrawal-typed-data.js";

export { mulDiv, convertToShares, convertToAssets, apportion } from "./share-math.js";
export type { Rounding } from "./share-math.js";

export type {
  ShareVaultConfig,
  GatedDepositVaultConfig,
  EscrowedShareMinter,
  DepositState,
  PendingDeposit,
  DepositEscrowConfig,
  WithdrawalRequest,
  SignedWithdrawal,
  ManagedRedeemer,
  WithdrawalAuthorizerConfig,
} from "./types.js";

export { VaultError, EscrowError, WithdrawalError } from "./errors.js";
export type { VaultErrorCode, EscrowErrorCode, WithdrawalErrorCode } from "./errors.js";
