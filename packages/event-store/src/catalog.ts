/**
 * @shareport/event-store — Event Catalog.
 *
 * Formalizes all domain events into a catalog with:
 * - Typed event definitions (type string → payload schema)
 * - Schema versioning (each event type tracks its schema version)
 * - Runtime payload validation at the store boundary
 *
 * Unknown event types are reported, never silently accepted.
 */

import type { ZodType } from "zod";
import type { DomainEvent, EventSource } from "@shareport/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "escrow.deposit.accepted") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** zod schema of the payload */
  readonly payload: ZodType;
}

export interface CatalogValidationResult {
  readonly valid: boolean;
  readonly issues: readonly string[];
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is idempotent; a higher version
   * replaces the schema; a lower version is refused.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }

    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event against its registered schema.
   */
  validate(event: DomainEvent): CatalogValidationResult {
    const schema = this._schemas.get(event.type);
    if (schema === undefined) {
      return { valid: false, issues: [`Unknown event type "${event.type}"`] };
    }

    const issues: string[] = [];
    if (event.metadata.source !== schema.source) {
      issues.push(
        `Event "${event.type}" must come from "${schema.source}", got "${event.metadata.source}"`,
      );
    }

    const parsed = schema.payload.safeParse(event.payload);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`${issue.path.join(".") || "payload"}: ${issue.message}`);
      }
    }

    return { valid: issues.length === 0, issues };
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
