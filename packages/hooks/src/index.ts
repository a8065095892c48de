/**
 * @shareport/hooks — Operation Hook Pipeline.
 *
 * Every balance-changing operation of a vault runs its tag's hooks before
 * any state changes. Hooks are pluggable validators; the pipeline keeps
 * them ordered and refuses to drop a hook that has already gated a
 * completed operation.
 */

export { HookPipeline } from "./pipeline.js";
export { evaluateHook, evaluateHooks } from "./evaluate.js";

export { BaseHook } from "./base-hook.js";
export { AllowListHook } from "./allow-list-hook.js";
export { CapacityCapHook } from "./capacity-cap-hook.js";
export type { CommittedAssetsView } from "./capacity-cap-hook.js";
export { CompositeHook } from "./composite-hook.js";

export { APPROVED, rejected } from "./types.js";
export type {
  DepositHookContext,
  WithdrawHookContext,
  TransferHookContext,
  HookInvocation,
  HookResult,
  OperationHook,
  HookEntry,
  HookEntryView,
} from "./types.js";

export { HookError, HookCheckFailedError } from "./errors.js";
export type { HookErrorCode } from "./errors.js";
