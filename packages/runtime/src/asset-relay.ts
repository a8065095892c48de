/**
 * Asset relay — the only path by which a component may pull assets out of
 * a user's account.
 *
 * Users approve the relay once; recognized components (vaults) then ask
 * the relay to move assets into recognized destinations (vault custody,
 * escrow custody). Anything else is refused.
 */

import type { Address } from "@shareport/types";
import type { AssetToken } from "./asset-token.js";
import { toAddress, toNonZeroAddress } from "./address.js";
import { RuntimeError } from "./errors.js";

/**
 * Contract of the external asset relay.
 */
export interface AssetRelay {
  readonly address: Address;
  pull(caller: Address, asset: Address, from: Address, to: Address, amount: bigint): boolean;
}

export class GuardedAssetRelay implements AssetRelay {
  readonly address: Address;
  private readonly _tokens = new Map<Address, AssetToken>();
  private readonly _destinations = new Map<Address, Set<Address>>();

  constructor(address: string, tokens: readonly AssetToken[]) {
    this.address = toNonZeroAddress(address, "relay address");
    for (const token of tokens) {
      this._tokens.set(token.address, token);
    }
  }

  /**
   * Allow `caller` to pull assets into each of `destinations`.
   */
  recognize(caller: string, destinations: readonly string[]): void {
    const component = toNonZeroAddress(caller, "caller");
    const allowed = this._destinations.get(component) ?? new Set<Address>();
    for (const destination of destinations) {
      allowed.add(toNonZeroAddress(destination, "destination"));
    }
    this._destinations.set(component, allowed);
  }

  isRecognized(caller: string): boolean {
    return this._destinations.has(toAddress(caller, "caller"));
  }

  pull(caller: Address, asset: Address, from: Address, to: Address, amount: bigint): boolean {
    const allowed = this._destinations.get(toAddress(caller, "caller"));
    if (allowed === undefined) {
      throw new RuntimeError("UNRECOGNIZED_CALLER", `${caller} may not pull assets through the relay`);
    }
    const destination = toAddress(to, "destination");
    if (!allowed.has(destination)) {
      throw new RuntimeError(
        "UNRECOGNIZED_DESTINATION",
        `${caller} may not send assets to ${destination}`,
      );
    }
    const token = this._tokens.get(toAddress(asset, "asset"));
    if (token === undefined) {
      throw new RuntimeError("UNKNOWN_ASSET", `Relay does not carry asset ${asset}`);
    }

    token.transferFrom(this.address, from, destination, amount);
    return true;
  }
}
