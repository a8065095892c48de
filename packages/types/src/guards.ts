/**
 * Runtime Type Guards
 *
 * Narrowing functions for values arriving from outside the process
 * (configuration, deserialized events, signed requests).
 */

import type { Address } from "./address.js";
import type { DomainEvent, EventMetadata, EventSource, JsonValue } from "./event.js";
import type { OperationTag } from "./operation.js";
import type { Role } from "./roles.js";
import { ROLES } from "./roles.js";
import { OPERATION_TAGS } from "./operation.js";
import { ShareportError } from "./errors.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const EVENT_SOURCES = new Set<string>(["hooks", "vault", "escrow", "oracle", "withdrawals"]);
const ROLE_SET = new Set<string>(ROLES);
const TAG_SET = new Set<string>(OPERATION_TAGS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Shape check only: 0x followed by 40 hex digits. Checksums are not verified.
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

export function isOperationTag(value: unknown): value is OperationTag {
  return typeof value === "string" && TAG_SET.has(value);
}

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.height === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload) &&
    isJsonValue(value.payload)
  );
}

/**
 * Narrow any thrown value to a ShareportError, or undefined.
 */
export function asShareportError(error: unknown): ShareportError | undefined {
  return error instanceof ShareportError ? error : undefined;
}
