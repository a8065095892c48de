/**
 * ManagedWithdrawVault — withdrawals only through an operator.
 *
 * Direct `withdraw` is disabled. Redemptions are executed by holders of
 * the vault-operator role, on behalf of owners who approved them, with an
 * optional floor on the assets released.
 */

import type { Address } from "@shareport/types";
import { ShareVault } from "./share-vault.js";
import type { ManagedRedeemer } from "./types.js";
import { VaultError } from "./errors.js";

export class ManagedWithdrawVault extends ShareVault implements ManagedRedeemer {
  override withdraw(_caller: Address, _assets: bigint, _receiver: string, _owner: string): bigint {
    throw new VaultError("UNSUPPORTED_OPERATION", "Withdrawals are operator-managed; use redeem");
  }

  /**
   * Redeem `shares` of `owner` to `receiver`. Fails when the assets
   * released would be below `minAssets`.
   */
  override redeem(
    caller: Address,
    shares: bigint,
    receiver: string,
    owner: string,
    minAssets = 0n,
  ): bigint {
    this.requireRole(caller, "vault-operator");
    return this.guard.run(() => this.redeemAtLeast(caller, shares, receiver, owner, minAssets));
  }

  /**
   * Run several managed redemptions as one operation. Any failing entry
   * aborts them all.
   */
  batchRedeem(
    caller: Address,
    shares: readonly bigint[],
    receivers: readonly string[],
    owners: readonly string[],
    minAssets: readonly bigint[],
  ): bigint[] {
    this.requireRole(caller, "vault-operator");
    const n = shares.length;
    if (receivers.length !== n || owners.length !== n || minAssets.length !== n) {
      throw new VaultError(
        "INVALID_ARRAY_LENGTHS",
        `Batch redeem needs equal lengths, got shares=${n} receivers=${receivers.length} owners=${owners.length} minAssets=${minAssets.length}`,
      );
    }

    return this.guard.run(() =>
      this.env.atomic(() =>
        shares.map((amount, i) =>
          this.redeemAtLeast(caller, amount, at(receivers, i), at(owners, i), at(minAssets, i)),
        ),
      ),
    );
  }

  private redeemAtLeast(
    caller: Address,
    shares: bigint,
    receiver: string,
    owner: string,
    minAssets: bigint,
  ): bigint {
    const expected = this.previewRedeem(shares);
    if (expected < minAssets) {
      throw new VaultError(
        "INSUFFICIENT_OUTPUT_ASSETS",
        `Redeeming ${shares} shares yields ${expected} assets, below the floor of ${minAssets}`,
      );
    }
    return this.redeemUnguarded(caller, shares, receiver, owner);
  }
}

function at<T>(values: readonly T[], index: number): T {
  const value = values[index];
  if (value === undefined) {
    throw new VaultError("INVALID_ARRAY_LENGTHS", `No entry at index ${index}`);
  }
  return value;
}
