/**
 * Ordered hook evaluation.
 *
 * Shared by the pipeline and by CompositeHook: hooks run strictly in
 * order, the first rejection stops evaluation and its reason is returned.
 */

import type { HookInvocation, HookResult, OperationHook } from "./types.js";
import { APPROVED } from "./types.js";

export function evaluateHook(hook: OperationHook, invocation: HookInvocation): HookResult {
  switch (invocation.tag) {
    case "deposit":
      return hook.onBeforeDeposit(invocation.context);
    case "withdraw":
      return hook.onBeforeWithdraw(invocation.context);
    case "transfer":
      return hook.onBeforeTransfer(invocation.context);
  }
}

export function evaluateHooks(
  hooks: Iterable<OperationHook>,
  invocation: HookInvocation,
): HookResult {
  for (const hook of hooks) {
    const result = evaluateHook(hook, invocation);
    if (!result.approved) {
      return result;
    }
  }
  return APPROVED;
}
