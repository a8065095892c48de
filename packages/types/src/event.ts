/**
 * Event Types
 *
 * Every committed state change in Shareport is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payloads are JSON values; amounts travel as decimal strings
 * - Events of a failed operation are never published
 */

/**
 * A JSON-serializable value. bigint is deliberately absent.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/** Subsystems that emit events. */
export type EventSource = "hooks" | "vault" | "escrow" | "oracle" | "withdrawals";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp taken from the execution environment clock */
  readonly timestamp: string;

  /** Block height at which the event was emitted */
  readonly height: string;

  /** Address that invoked the operation */
  readonly actor: string;

  /** Shared by every event emitted inside one atomic operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "escrow.deposit.accepted") */
  readonly type: string;

  readonly metadata: EventMetadata;

  readonly payload: Readonly<Record<string, JsonValue>>;
}
