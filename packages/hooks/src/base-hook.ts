/**
 * BaseHook — approves every operation.
 *
 * Concrete hooks extend it and override only the checks they care about.
 */

import type {
  DepositHookContext,
  HookResult,
  OperationHook,
  TransferHookContext,
  WithdrawHookContext,
} from "./types.js";
import { APPROVED } from "./types.js";

export abstract class BaseHook implements OperationHook {
  constructor(readonly name: string) {}

  onBeforeDeposit(_context: DepositHookContext): HookResult {
    return APPROVED;
  }

  onBeforeWithdraw(_context: WithdrawHookContext): HookResult {
    return APPROVED;
  }

  onBeforeTransfer(_context: TransferHookContext): HookResult {
    return APPROVED;
  }
}
