/**
 * GatedDepositVault — deposits wait in escrow for an operator.
 *
 * `requestDeposit` runs the deposit hooks and moves the assets into the
 * vault's own DepositEscrow. Shares are minted only when the escrow
 * accepts the deposit, through the privileged `mintShares` path that only
 * the bound escrow may call.
 */

import type { Address, Hex } from "@shareport/types";
import { ZERO_ADDRESS } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { Environment } from "@shareport/runtime";
import { toAddress, toNonZeroAddress } from "@shareport/runtime";
import { ShareVault, assertPositive } from "./share-vault.js";
import { DepositEscrow } from "./deposit-escrow.js";
import type { EscrowedShareMinter, GatedDepositVaultConfig } from "./types.js";
import { apportion } from "./share-math.js";
import { VaultError } from "./errors.js";

export class GatedDepositVault extends ShareVault implements EscrowedShareMinter {
  readonly escrow: DepositEscrow;

  constructor(env: Environment, config: GatedDepositVaultConfig) {
    super(env, config);
    this.escrow = new DepositEscrow(env, {
      address: config.escrowAddress,
      vault: this,
      asset: config.asset,
      authorization: config.authorization,
      expirationSeconds: config.depositExpirationSeconds,
    });
  }

  /** Includes deposits still pending in escrow. */
  override committedAssets(): bigint {
    return this.totalAssets() + this.escrow.totalPendingAssets;
  }

  /**
   * Place `assets` in escrow for `receiver`.
   * @returns the pending deposit's id
   */
  requestDeposit(caller: Address, assets: bigint, receiver: string): Hex {
    assertPositive(assets, "assets");
    const depositor = toNonZeroAddress(caller, "depositor");
    const recipient = toNonZeroAddress(receiver, "receiver");

    return this.guard.run(() =>
      this.env.atomic(() => {
        this.hooks.assertAll({
          tag: "deposit",
          context: { token: this.address, operator: depositor, assets, receiver: recipient },
        });
        this.relay.pull(this.address, this.asset.address, depositor, this.escrow.address, assets);
        const id = this.escrow.recordDeposit(this.address, depositor, recipient, assets);
        this.hooks.markExecuted("deposit");
        return id;
      }),
    );
  }

  /**
   * Same as requestDeposit. No shares exist until the escrow accepts.
   * @returns 0
   */
  override deposit(caller: Address, assets: bigint, receiver: string): bigint {
    this.requestDeposit(caller, assets, receiver);
    return 0n;
  }

  override mint(_caller: Address, _shares: bigint, _receiver: string): bigint {
    throw new VaultError("UNSUPPORTED_OPERATION", "Gated vaults take deposits by asset amount only");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Escrow-only mint
  // ───────────────────────────────────────────────────────────────────────

  mintShares(caller: Address, receiver: Address, assets: bigint): bigint {
    this.requireEscrow(caller);
    const to = toNonZeroAddress(receiver, "receiver");

    return this.guard.run(() =>
      this.env.atomic(() => {
        const shares = this.previewDeposit(assets);
        this.mintFromEscrow(to, assets, shares);
        return shares;
      }),
    );
  }

  /**
   * Price the whole batch once and split the shares pro rata. Rounding
   * dust is never minted.
   */
  batchMintShares(caller: Address, receivers: readonly Address[], assets: readonly bigint[]): bigint[] {
    this.requireEscrow(caller);
    if (receivers.length !== assets.length) {
      throw new VaultError(
        "INVALID_ARRAY_LENGTHS",
        `Batch mint needs equal lengths, got receivers=${receivers.length} assets=${assets.length}`,
      );
    }
    if (receivers.length === 0) {
      throw new VaultError("EMPTY_BATCH", "Batch mint needs at least one deposit");
    }
    const recipients = receivers.map((receiver) => toNonZeroAddress(receiver, "receiver"));

    return this.guard.run(() =>
      this.env.atomic(() => {
        const total = assets.reduce((sum, amount) => sum + amount, 0n);
        const shares = apportion(assets, this.previewDeposit(total));
        shares.forEach((amount, i) => {
          const recipient = recipients[i];
          const deposited = assets[i];
          if (recipient !== undefined && deposited !== undefined) {
            this.mintFromEscrow(recipient, deposited, amount);
          }
        });
        return shares;
      }),
    );
  }

  private mintFromEscrow(receiver: Address, assets: bigint, shares: bigint): void {
    this._update(ZERO_ADDRESS, receiver, shares);
    this.env.emit(this.streamId, SHAREPORT_EVENTS.SHARES_DEPOSITED, "vault", this.escrow.address, {
      sender: this.escrow.address,
      owner: receiver,
      assets: assets.toString(),
      shares: shares.toString(),
    });
  }

  private requireEscrow(caller: Address): void {
    if (toAddress(caller, "caller") !== this.escrow.address) {
      throw new VaultError("UNAUTHORIZED", `${caller} is not this vault's deposit escrow`);
    }
  }
}
