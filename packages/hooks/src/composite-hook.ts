/**
 * CompositeHook — several hooks evaluated as one, in order.
 *
 * Uses the same first-rejection-wins evaluation as the pipeline, so a
 * composite can be nested inside a pipeline or inside another composite.
 */

import type {
  DepositHookContext,
  HookResult,
  OperationHook,
  TransferHookContext,
  WithdrawHookContext,
} from "./types.js";
import { evaluateHooks } from "./evaluate.js";
import { HookError } from "./errors.js";

export class CompositeHook implements OperationHook {
  readonly hooks: readonly OperationHook[];

  constructor(
    readonly name: string,
    hooks: readonly OperationHook[],
  ) {
    if (hooks.length === 0) {
      throw new HookError("INVALID_HOOK", `Composite hook "${name}" needs at least one hook`);
    }
    this.hooks = [...hooks];
  }

  onBeforeDeposit(context: DepositHookContext): HookResult {
    return evaluateHooks(this.hooks, { tag: "deposit", context });
  }

  onBeforeWithdraw(context: WithdrawHookContext): HookResult {
    return evaluateHooks(this.hooks, { tag: "withdraw", context });
  }

  onBeforeTransfer(context: TransferHookContext): HookResult {
    return evaluateHooks(this.hooks, { tag: "transfer", context });
  }
}
