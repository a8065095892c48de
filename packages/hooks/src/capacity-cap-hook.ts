/**
 * CapacityCapHook — refuses deposits that would take committed assets past
 * a ceiling.
 */

import { BaseHook } from "./base-hook.js";
import type { DepositHookContext, HookResult } from "./types.js";
import { APPROVED, rejected } from "./types.js";
import { HookError } from "./errors.js";

/**
 * Anything that can report the assets it manages or has already promised
 * to take in, such as deposits still waiting in escrow.
 */
export interface CommittedAssetsView {
  committedAssets(): bigint;
}

export class CapacityCapHook extends BaseHook {
  private _cap: bigint;

  constructor(
    private readonly vault: CommittedAssetsView,
    cap: bigint,
    name = "capacity-cap",
  ) {
    super(name);
    this._cap = validCap(cap);
  }

  get cap(): bigint {
    return this._cap;
  }

  setCap(cap: bigint): void {
    this._cap = validCap(cap);
  }

  override onBeforeDeposit(context: DepositHookContext): HookResult {
    const after = this.vault.committedAssets() + context.assets;
    if (after > this._cap) {
      return rejected(`deposit of ${context.assets} exceeds capacity ${this._cap} (would reach ${after})`);
    }
    return APPROVED;
  }
}

function validCap(cap: bigint): bigint {
  if (cap <= 0n) {
    throw new HookError("INVALID_CAP", `Capacity must be positive, got ${cap}`);
  }
  return cap;
}
