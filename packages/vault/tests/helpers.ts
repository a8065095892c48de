/**
 * Shared fixtures for vault tests.
 */

import type { Address } from "@shareport/types";
import { AssetToken, Environment, GuardedAssetRelay, RoleRegistry } from "@shareport/runtime";
import { BaseHook, APPROVED } from "@shareport/hooks";
import type {
  DepositHookContext,
  HookResult,
  TransferHookContext,
  WithdrawHookContext,
} from "@shareport/hooks";
import { ShareVault } from "../src/share-vault.js";
import { ManagedWithdrawVault } from "../src/managed-withdraw-vault.js";
import { GatedDepositVault } from "../src/gated-deposit-vault.js";
import type { ShareVaultConfig } from "../src/types.js";

export const ADMIN: Address = "0x0000000000000000000000000000000000000001";
export const ALICE: Address = "0x0000000000000000000000000000000000000002";
export const BOB: Address = "0x0000000000000000000000000000000000000003";
export const CAROL: Address = "0x0000000000000000000000000000000000000004";
export const OPERATOR: Address = "0x0000000000000000000000000000000000000005";

export const VAULT: Address = "0x0000000000000000000000000000000000000010";
export const ESCROW: Address = "0x0000000000000000000000000000000000000011";
export const RELAY: Address = "0x0000000000000000000000000000000000000012";
export const ASSET: Address = "0x0000000000000000000000000000000000000013";
export const AUTHORIZER: Address = "0x0000000000000000000000000000000000000014";

export const SEVEN_DAYS = 7n * 24n * 60n * 60n;

export interface Fixture {
  readonly env: Environment;
  readonly asset: AssetToken;
  readonly relay: GuardedAssetRelay;
  readonly roles: RoleRegistry;
}

export function createFixture(): Fixture {
  const env = new Environment({ chainId: 31337 });
  const asset = new AssetToken({ address: ASSET, symbol: "USDX", decimals: 6 }, env);
  const relay = new GuardedAssetRelay(RELAY, [asset]);
  const roles = new RoleRegistry();
  roles.grant(ADMIN, "hook-admin");
  roles.grant(OPERATOR, "vault-operator");
  roles.grant(OPERATOR, "deposit-operator");
  roles.grant(OPERATOR, "withdrawal-operator");
  return { env, asset, relay, roles };
}

/** Give `account` assets and approve the relay to pull them. */
export function fund(f: Fixture, account: Address, amount: bigint): void {
  f.asset.mint(account, amount);
  f.asset.approve(account, RELAY, f.asset.allowance(account, RELAY) + amount);
}

function vaultConfig(f: Fixture): ShareVaultConfig {
  return {
    address: VAULT,
    name: "Shareport Test Shares",
    symbol: "sUSDX",
    asset: f.asset,
    relay: f.relay,
    authorization: f.roles,
  };
}

export function createShareVault(f: Fixture): ShareVault {
  f.relay.recognize(VAULT, [VAULT]);
  return new ShareVault(f.env, vaultConfig(f));
}

export function createManagedVault(f: Fixture): ManagedWithdrawVault {
  f.relay.recognize(VAULT, [VAULT]);
  return new ManagedWithdrawVault(f.env, vaultConfig(f));
}

export function createGatedVault(f: Fixture): GatedDepositVault {
  f.relay.recognize(VAULT, [VAULT, ESCROW]);
  return new GatedDepositVault(f.env, {
    ...vaultConfig(f),
    escrowAddress: ESCROW,
    depositExpirationSeconds: SEVEN_DAYS,
  });
}

export interface HookHandlers {
  deposit?: (context: DepositHookContext) => HookResult;
  withdraw?: (context: WithdrawHookContext) => HookResult;
  transfer?: (context: TransferHookContext) => HookResult;
}

/**
 * A hook built from plain functions; unset checks approve.
 */
export class FunctionHook extends BaseHook {
  constructor(
    name: string,
    private readonly handlers: HookHandlers,
  ) {
    super(name);
  }

  override onBeforeDeposit(context: DepositHookContext): HookResult {
    return this.handlers.deposit?.(context) ?? APPROVED;
  }

  override onBeforeWithdraw(context: WithdrawHookContext): HookResult {
    return this.handlers.withdraw?.(context) ?? APPROVED;
  }

  override onBeforeTransfer(context: TransferHookContext): HookResult {
    return this.handlers.transfer?.(context) ?? APPROVED;
  }
}

/** The value `operation` throws, or undefined. */
export function thrownBy(operation: () => unknown): unknown {
  try {
    operation();
  } catch (error) {
    return error;
  }
  return undefined;
}
