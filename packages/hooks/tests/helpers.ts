import type { Address } from "@shareport/types";
import { BaseHook } from "../src/base-hook.js";
import type { DepositHookContext, HookResult, TransferHookContext } from "../src/types.js";
import { APPROVED, rejected } from "../src/types.js";

export const ADMIN: Address = "0x0000000000000000000000000000000000000001";
export const ALICE: Address = "0x0000000000000000000000000000000000000002";
export const BOB: Address = "0x0000000000000000000000000000000000000003";
export const VAULT: Address = "0x0000000000000000000000000000000000000010";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

export function depositContext(assets = 100n): DepositHookContext {
  return { token: VAULT, operator: ALICE, assets, receiver: ALICE };
}

/**
 * Records every call into a shared log and answers with a fixed verdict.
 */
export class RecordingHook extends BaseHook {
  constructor(
    name: string,
    private readonly log: string[],
    private readonly reason?: string,
  ) {
    super(name);
  }

  override onBeforeDeposit(_context: DepositHookContext): HookResult {
    this.log.push(this.name);
    return this.reason === undefined ? APPROVED : rejected(this.reason);
  }

  override onBeforeTransfer(_context: TransferHookContext): HookResult {
    this.log.push(this.name);
    return this.reason === undefined ? APPROVED : rejected(this.reason);
  }
}
