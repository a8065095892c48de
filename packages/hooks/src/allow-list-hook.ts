/**
 * AllowListHook — only listed addresses may hold or move shares.
 *
 * - deposit: operator and receiver must be listed
 * - withdraw: owner and receiver must be listed
 * - transfer: both counterparties must be listed; the zero address
 *   (mint/burn counterparty) is always tolerated
 */

import type { Address } from "@shareport/types";
import { isZeroAddress } from "@shareport/types";
import { toNonZeroAddress } from "@shareport/runtime";
import { BaseHook } from "./base-hook.js";
import type {
  DepositHookContext,
  HookResult,
  TransferHookContext,
  WithdrawHookContext,
} from "./types.js";
import { APPROVED, rejected } from "./types.js";

export class AllowListHook extends BaseHook {
  private readonly _allowed = new Set<Address>();

  constructor(name = "allow-list", initial: readonly string[] = []) {
    super(name);
    for (const account of initial) {
      this.allow(account);
    }
  }

  allow(account: string): void {
    this._allowed.add(toNonZeroAddress(account, "account"));
  }

  disallow(account: string): void {
    this._allowed.delete(toNonZeroAddress(account, "account"));
  }

  isAllowed(account: Address): boolean {
    return isZeroAddress(account) || this._allowed.has(account);
  }

  override onBeforeDeposit(context: DepositHookContext): HookResult {
    return this.check([context.operator, context.receiver]);
  }

  override onBeforeWithdraw(context: WithdrawHookContext): HookResult {
    return this.check([context.owner, context.receiver]);
  }

  override onBeforeTransfer(context: TransferHookContext): HookResult {
    return this.check([context.from, context.to]);
  }

  private check(accounts: readonly Address[]): HookResult {
    for (const account of accounts) {
      if (!this.isAllowed(account)) {
        return rejected(`address not allowed: ${account}`);
      }
    }
    return APPROVED;
  }
}
