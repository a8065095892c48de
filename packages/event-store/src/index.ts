/**
 * @shareport/event-store — Append-only event persistence.
 *
 * Every committed Shareport operation publishes its domain events here.
 * Events are hash-chained (RFC 8785 + SHA-256) so the audit trail is
 * tamper-evident, and validated against a versioned catalog.
 */

export { InMemoryEventStore } from "./in-memory-store.js";

export { GENESIS_HASH, computeEventHash, verifyHashChain } from "./hash-chain.js";

export { EventCatalog, CatalogError } from "./catalog.js";
export type { EventSchema, CatalogValidationResult } from "./catalog.js";

export {
  SHAREPORT_EVENTS,
  SHAREPORT_EVENT_SCHEMAS,
  createShareportCatalog,
  HookAddedPayload,
  HookRemovedPayload,
  HooksReorderedPayload,
  SharesDepositedPayload,
  SharesWithdrawnPayload,
  SharesTransferredPayload,
  SharesApprovedPayload,
  DepositPendingPayload,
  DepositAcceptedPayload,
  DepositRefundedPayload,
  DepositReclaimedPayload,
  DepositBatchPayload,
  PriceUpdatedPayload,
  PolicyUpdatedPayload,
  TransitionCompletedPayload,
  UpdaterSetPayload,
  NonceUsedPayload,
} from "./shareport-events.js";
export type { ShareportEventType } from "./shareport-events.js";

export type {
  StoredEvent,
  HashableEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";
