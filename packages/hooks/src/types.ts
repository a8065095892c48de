/**
 * Hook Types
 *
 * A hook is a validator consulted before a balance-changing operation.
 * It approves or rejects with a reason; it never mutates vault state.
 */

import type { Address, OperationTag } from "@shareport/types";

// =============================================================================
// Contexts
// =============================================================================

export interface DepositHookContext {
  /** The share token (vault) being deposited into */
  readonly token: Address;
  /** Who initiated the deposit */
  readonly operator: Address;
  readonly assets: bigint;
  readonly receiver: Address;
}

export interface WithdrawHookContext {
  readonly token: Address;
  readonly operator: Address;
  readonly assets: bigint;
  readonly receiver: Address;
  readonly owner: Address;
}

/**
 * Share movement. `from` is the zero address on mint, `to` on burn.
 */
export interface TransferHookContext {
  readonly token: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * A tag paired with its context.
 */
export type HookInvocation =
  | { readonly tag: "deposit"; readonly context: DepositHookContext }
  | { readonly tag: "withdraw"; readonly context: WithdrawHookContext }
  | { readonly tag: "transfer"; readonly context: TransferHookContext };

// =============================================================================
// Results
// =============================================================================

export type HookResult =
  | { readonly approved: true }
  | { readonly approved: false; readonly reason: string };

export const APPROVED: HookResult = { approved: true };

export function rejected(reason: string): HookResult {
  return { approved: false, reason };
}

// =============================================================================
// Hook capability
// =============================================================================

export interface OperationHook {
  /** Human-readable identifier, used in events and listings */
  readonly name: string;

  onBeforeDeposit(context: DepositHookContext): HookResult;
  onBeforeWithdraw(context: WithdrawHookContext): HookResult;
  onBeforeTransfer(context: TransferHookContext): HookResult;
}

// =============================================================================
// Pipeline entries
// =============================================================================

export interface HookEntry {
  readonly hook: OperationHook;
  /** Global sequence value at which the hook was added */
  readonly registeredAtSequence: number;
}

export interface HookEntryView {
  readonly tag: OperationTag;
  readonly index: number;
  readonly name: string;
  readonly registeredAtSequence: number;
  /** False once an operation of this tag has completed since registration */
  readonly removable: boolean;
}
