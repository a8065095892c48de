/**
 * @shareport/event-store — Shareport Domain Event Definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Amounts, prices and timestamps are unsigned decimal strings.
 */

import { z } from "zod";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

const uint = z.string().regex(/^\d+$/, "expected an unsigned integer string");
const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "expected an address");
const bytes32 = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte hex id");
const tag = z.enum(["deposit", "withdraw", "transfer"]);

// =============================================================================
// Hook pipeline
// =============================================================================

export const HookAddedPayload = z.object({
  tag,
  index: z.number().int().nonnegative(),
  hookName: z.string(),
  registeredAtSequence: z.number().int().positive(),
});

export const HookRemovedPayload = z.object({
  tag,
  index: z.number().int().nonnegative(),
  hookName: z.string(),
});

export const HooksReorderedPayload = z.object({
  tag,
  newOrder: z.array(z.number().int().nonnegative()),
});

// =============================================================================
// Vault
// =============================================================================

export const SharesDepositedPayload = z.object({
  sender: address,
  owner: address,
  assets: uint,
  shares: uint,
});

export const SharesWithdrawnPayload = z.object({
  sender: address,
  receiver: address,
  owner: address,
  assets: uint,
  shares: uint,
});

export const SharesTransferredPayload = z.object({
  from: address,
  to: address,
  amount: uint,
});

export const SharesApprovedPayload = z.object({
  owner: address,
  spender: address,
  amount: uint,
});

// =============================================================================
// Escrow
// =============================================================================

export const DepositPendingPayload = z.object({
  depositId: bytes32,
  depositor: address,
  recipient: address,
  assetAmount: uint,
  expirationTime: uint,
  roundAtCreation: z.number().int().nonnegative(),
});

export const DepositAcceptedPayload = z.object({
  depositId: bytes32,
  recipient: address,
  assetAmount: uint,
  round: z.number().int().nonnegative(),
});

export const DepositRefundedPayload = z.object({
  depositId: bytes32,
  depositor: address,
  assetAmount: uint,
  round: z.number().int().nonnegative(),
});

export const DepositReclaimedPayload = z.object({
  depositId: bytes32,
  depositor: address,
  assetAmount: uint,
});

export const DepositBatchPayload = z.object({
  depositIds: z.array(bytes32).nonempty(),
  totalAssets: uint,
  round: z.number().int().nonnegative(),
});

// =============================================================================
// Oracle
// =============================================================================

export const PriceUpdatedPayload = z.object({
  round: z.number().int().positive(),
  targetPrice: uint,
  transitionStartPrice: uint,
  source: z.string().min(1),
  immediate: z.boolean(),
});

export const PolicyUpdatedPayload = z.object({
  oldMaxDeviationBps: uint,
  newMaxDeviationBps: uint,
  oldPeriodSeconds: uint,
  newPeriodSeconds: uint,
});

export const TransitionCompletedPayload = z.object({
  price: uint,
});

export const UpdaterSetPayload = z.object({
  updater: address,
  allowed: z.boolean(),
});

// =============================================================================
// Signed withdrawals
// =============================================================================

export const NonceUsedPayload = z.object({
  owner: address,
  nonce: uint,
  to: address,
  shares: uint,
});

// =============================================================================
// Event Type Constants
// =============================================================================

export const SHAREPORT_EVENTS = {
  HOOK_ADDED: "hooks.hook.added",
  HOOK_REMOVED: "hooks.hook.removed",
  HOOKS_REORDERED: "hooks.hooks.reordered",

  SHARES_DEPOSITED: "vault.shares.deposited",
  SHARES_WITHDRAWN: "vault.shares.withdrawn",
  SHARES_TRANSFERRED: "vault.shares.transferred",
  SHARES_APPROVED: "vault.shares.approved",

  DEPOSIT_PENDING: "escrow.deposit.pending",
  DEPOSIT_ACCEPTED: "escrow.deposit.accepted",
  DEPOSIT_REFUNDED: "escrow.deposit.refunded",
  DEPOSIT_RECLAIMED: "escrow.deposit.reclaimed",
  BATCH_ACCEPTED: "escrow.batch.accepted",
  BATCH_REFUNDED: "escrow.batch.refunded",

  PRICE_UPDATED: "oracle.price.updated",
  POLICY_UPDATED: "oracle.policy.updated",
  TRANSITION_COMPLETED: "oracle.transition.completed",
  UPDATER_SET: "oracle.updater.set",

  NONCE_USED: "withdrawals.nonce.used",
} as const;

export type ShareportEventType = (typeof SHAREPORT_EVENTS)[keyof typeof SHAREPORT_EVENTS];

// =============================================================================
// Schema Registrations
// =============================================================================

export const SHAREPORT_EVENT_SCHEMAS: readonly EventSchema[] = [
  { type: SHAREPORT_EVENTS.HOOK_ADDED, version: 1, source: "hooks", description: "A hook was appended to an operation's pipeline", payload: HookAddedPayload },
  { type: SHAREPORT_EVENTS.HOOK_REMOVED, version: 1, source: "hooks", description: "A hook that never gated an operation was removed", payload: HookRemovedPayload },
  { type: SHAREPORT_EVENTS.HOOKS_REORDERED, version: 1, source: "hooks", description: "An operation's hooks were permuted", payload: HooksReorderedPayload },

  { type: SHAREPORT_EVENTS.SHARES_DEPOSITED, version: 1, source: "vault", description: "Assets entered custody and shares were minted", payload: SharesDepositedPayload },
  { type: SHAREPORT_EVENTS.SHARES_WITHDRAWN, version: 1, source: "vault", description: "Shares were burned and assets released", payload: SharesWithdrawnPayload },
  { type: SHAREPORT_EVENTS.SHARES_TRANSFERRED, version: 1, source: "vault", description: "Share balance moved (including mint and burn)", payload: SharesTransferredPayload },
  { type: SHAREPORT_EVENTS.SHARES_APPROVED, version: 1, source: "vault", description: "A share allowance was set", payload: SharesApprovedPayload },

  { type: SHAREPORT_EVENTS.DEPOSIT_PENDING, version: 1, source: "escrow", description: "A deposit entered escrow awaiting an operator decision", payload: DepositPendingPayload },
  { type: SHAREPORT_EVENTS.DEPOSIT_ACCEPTED, version: 1, source: "escrow", description: "An escrowed deposit was accepted and shares minted", payload: DepositAcceptedPayload },
  { type: SHAREPORT_EVENTS.DEPOSIT_REFUNDED, version: 1, source: "escrow", description: "An escrowed deposit was refunded by the operator", payload: DepositRefundedPayload },
  { type: SHAREPORT_EVENTS.DEPOSIT_RECLAIMED, version: 1, source: "escrow", description: "A depositor reclaimed a stale or expired deposit", payload: DepositReclaimedPayload },
  { type: SHAREPORT_EVENTS.BATCH_ACCEPTED, version: 1, source: "escrow", description: "Several deposits were accepted in one round", payload: DepositBatchPayload },
  { type: SHAREPORT_EVENTS.BATCH_REFUNDED, version: 1, source: "escrow", description: "Several deposits were refunded in one round", payload: DepositBatchPayload },

  { type: SHAREPORT_EVENTS.PRICE_UPDATED, version: 1, source: "oracle", description: "A new target price was reported", payload: PriceUpdatedPayload },
  { type: SHAREPORT_EVENTS.POLICY_UPDATED, version: 1, source: "oracle", description: "The maximum deviation policy changed", payload: PolicyUpdatedPayload },
  { type: SHAREPORT_EVENTS.TRANSITION_COMPLETED, version: 1, source: "oracle", description: "An in-progress transition was forced to its target", payload: TransitionCompletedPayload },
  { type: SHAREPORT_EVENTS.UPDATER_SET, version: 1, source: "oracle", description: "A price updater was authorized or revoked", payload: UpdaterSetPayload },

  { type: SHAREPORT_EVENTS.NONCE_USED, version: 1, source: "withdrawals", description: "A signed withdrawal request was consumed", payload: NonceUsedPayload },
];

/**
 * A catalog pre-loaded with every Shareport event type.
 */
export function createShareportCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SHAREPORT_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
