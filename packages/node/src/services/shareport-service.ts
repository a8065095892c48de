/**
 * ShareportService — Composition root for all domain packages.
 *
 * Builds one environment and wires the asset, relay, role registry,
 * price oracle, gated-deposit vault (with its escrow), managed-withdraw
 * vault and withdrawal authorizer into it. Component addresses are derived
 * from the admin address the way contract deployments derive them from a
 * deployer and its nonce.
 *
 * The two vaults keep independent share ledgers: shares minted through
 * escrow cannot be redeemed by the withdrawal authorizer.
 */

import { getContractAddress } from "viem";
import type { Address } from "@shareport/types";
import { ROLES } from "@shareport/types";
import type { Subscription } from "@shareport/event-store";
import {
  AssetToken,
  Environment,
  GuardedAssetRelay,
  RoleRegistry,
  toNonZeroAddress,
} from "@shareport/runtime";
import { PriceTransitionOracle } from "@shareport/oracle";
import {
  GatedDepositVault,
  ManagedWithdrawVault,
  ReportedValuation,
  WithdrawalAuthorizer,
} from "@shareport/vault";
import type { AppConfig } from "../config.js";
import { parseRoleGrants } from "../config.js";
import { toErrorEnvelope } from "../errors.js";
import type { Logger } from "../logger.js";

// =============================================================================
// Types
// =============================================================================

export interface ShareportAddresses {
  readonly admin: Address;
  readonly asset: Address;
  readonly relay: Address;
  readonly depositVault: Address;
  readonly escrow: Address;
  readonly redemptionVault: Address;
  readonly oracle: Address;
  readonly authorizer: Address;
}

/**
 * Point-in-time view of the service, amounts as decimal strings.
 */
export interface ShareportStatus {
  readonly chainId: number;
  readonly height: string;
  readonly timestamp: string;
  readonly oraclePrice: string;
  readonly oracleRound: number;
  readonly depositVault: { readonly totalSupply: string; readonly totalAssets: string };
  readonly redemptionVault: { readonly totalSupply: string; readonly totalAssets: string };
  readonly escrow: { readonly totalPendingAssets: string; readonly currentRound: number };
  readonly eventCount: number;
  /** Hash-chain check over every committed event. */
  readonly integrity: { readonly valid: boolean; readonly lastVerifiedPosition: number };
}

// =============================================================================
// Addresses
// =============================================================================

const DEPLOY_ORDER = [
  "asset",
  "relay",
  "depositVault",
  "escrow",
  "redemptionVault",
  "oracle",
  "authorizer",
] as const;

export function deriveAddresses(admin: Address): ShareportAddresses {
  const derive = (name: (typeof DEPLOY_ORDER)[number]): Address =>
    getContractAddress({ from: admin, nonce: BigInt(DEPLOY_ORDER.indexOf(name)) });

  return {
    admin,
    asset: derive("asset"),
    relay: derive("relay"),
    depositVault: derive("depositVault"),
    escrow: derive("escrow"),
    redemptionVault: derive("redemptionVault"),
    oracle: derive("oracle"),
    authorizer: derive("authorizer"),
  };
}

// =============================================================================
// Service
// =============================================================================

export class ShareportService {
  readonly addresses: ShareportAddresses;
  readonly env: Environment;
  readonly asset: AssetToken;
  readonly relay: GuardedAssetRelay;
  readonly roles: RoleRegistry;
  readonly oracle: PriceTransitionOracle;
  readonly depositVault: GatedDepositVault;
  readonly redemptionVault: ManagedWithdrawVault;
  readonly authorizer: WithdrawalAuthorizer;

  private readonly log: Logger;
  private readonly _subscription: Subscription;

  constructor(config: AppConfig, logger: Logger) {
    this.log = logger.child({ component: "shareport-service" });
    this.addresses = deriveAddresses(toNonZeroAddress(config.ADMIN_ADDRESS, "ADMIN_ADDRESS"));
    const { addresses } = this;

    this.env = new Environment({ chainId: config.CHAIN_ID });
    this._subscription = this.env.events.subscribeAll((stored) => {
      this.log.info(
        {
          type: stored.event.type,
          stream: stored.streamId,
          position: stored.globalPosition,
          correlationId: stored.event.metadata.correlationId,
        },
        "event committed",
      );
    });

    this.asset = new AssetToken(
      { address: addresses.asset, symbol: config.ASSET_SYMBOL, decimals: config.ASSET_DECIMALS },
      this.env,
    );
    this.relay = new GuardedAssetRelay(addresses.relay, [this.asset]);
    this.relay.recognize(addresses.depositVault, [addresses.depositVault, addresses.escrow]);
    this.relay.recognize(addresses.redemptionVault, [addresses.redemptionVault]);

    this.roles = new RoleRegistry();
    for (const role of ROLES) {
      this.roles.grant(addresses.admin, role);
    }
    // Signed withdrawals redeem through the managed vault as the authorizer.
    this.roles.grant(addresses.authorizer, "vault-operator");
    for (const grant of parseRoleGrants(config.ROLE_GRANTS)) {
      this.roles.grant(grant.account, grant.role);
    }

    this.oracle = new PriceTransitionOracle(this.env, {
      address: addresses.oracle,
      owner: addresses.admin,
      initialPrice: config.ORACLE_INITIAL_PRICE,
      maxDeviationBps: config.ORACLE_MAX_DEVIATION_BPS,
      periodSeconds: config.ORACLE_PERIOD_SECONDS,
    });

    this.depositVault = new GatedDepositVault(this.env, {
      address: addresses.depositVault,
      name: config.SHARE_NAME,
      symbol: config.SHARE_SYMBOL,
      asset: this.asset,
      relay: this.relay,
      authorization: this.roles,
      escrowAddress: addresses.escrow,
      depositExpirationSeconds: config.DEPOSIT_EXPIRATION_SECONDS,
    });

    this.redemptionVault = new ManagedWithdrawVault(this.env, {
      address: addresses.redemptionVault,
      name: `${config.SHARE_NAME} (managed)`,
      symbol: `m${config.SHARE_SYMBOL}`,
      asset: this.asset,
      relay: this.relay,
      authorization: this.roles,
      valuation: new ReportedValuation(this.oracle),
    });

    this.authorizer = new WithdrawalAuthorizer(this.env, {
      address: addresses.authorizer,
      vault: this.redemptionVault,
      authorization: this.roles,
      domainName: config.WITHDRAWAL_DOMAIN_NAME,
      domainVersion: config.WITHDRAWAL_DOMAIN_VERSION,
    });

    this.log.info(
      { chainId: config.CHAIN_ID, admin: addresses.admin, depositVault: addresses.depositVault },
      "service ready",
    );
  }

  // ─── Operations ────────────────────────────────────────────────────

  /**
   * Run an operation, logging its failure as an error envelope before
   * rethrowing.
   */
  execute<T>(action: string, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      this.logFailure(action, error);
      throw error;
    }
  }

  async executeAsync<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.logFailure(action, error);
      throw error;
    }
  }

  // ─── Queries ───────────────────────────────────────────────────────

  status(): ShareportStatus {
    const { escrow } = this.depositVault;
    const integrity = this.env.events.verifyIntegrity();
    return {
      chainId: this.env.chainId,
      height: this.env.height.toString(),
      timestamp: this.env.timestamp.toString(),
      oraclePrice: this.oracle.getCurrentPrice().toString(),
      oracleRound: this.oracle.getState().round,
      depositVault: {
        totalSupply: this.depositVault.totalSupply.toString(),
        totalAssets: this.depositVault.totalAssets().toString(),
      },
      redemptionVault: {
        totalSupply: this.redemptionVault.totalSupply.toString(),
        totalAssets: this.redemptionVault.totalAssets().toString(),
      },
      escrow: {
        totalPendingAssets: escrow.totalPendingAssets.toString(),
        currentRound: escrow.currentRound,
      },
      eventCount: this.env.events.globalPosition(),
      integrity: { valid: integrity.valid, lastVerifiedPosition: integrity.lastVerifiedPosition },
    };
  }

  /**
   * Stop logging committed events.
   */
  close(): void {
    this._subscription.unsubscribe();
  }

  private logFailure(action: string, error: unknown): void {
    const { error: detail } = toErrorEnvelope(error);
    this.log.warn({ action, ...detail }, "operation failed");
  }
}
