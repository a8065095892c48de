/**
 * @shareport/types — Shared domain types for the Shareport stack.
 *
 * These types are used across all Shareport packages:
 * - Identity (addresses, hex payloads)
 * - Roles and the authorization oracle contract
 * - Operation tags for the hook pipeline
 * - Valuation and price reporting contracts
 * - Event architecture
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint in memory and decimal strings on the wire
 */

// Identity
export type { Address, Hex } from "./address.js";
export { ZERO_ADDRESS, isZeroAddress } from "./address.js";

// Roles
export type { Role, AuthorizationOracle } from "./roles.js";
export { ROLES } from "./roles.js";

// Operations
export type { OperationTag } from "./operation.js";
export { OPERATION_TAGS } from "./operation.js";

// Valuation
export type { ValuationSource, PriceReporter } from "./valuation.js";

// Events
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  JsonValue,
} from "./event.js";

// Errors
export type { ErrorCategory } from "./errors.js";
export { ShareportError } from "./errors.js";

// Runtime type guards
export {
  isAddress,
  isRole,
  isOperationTag,
  isEventSource,
  isJsonValue,
  isEventMetadata,
  isDomainEvent,
  asShareportError,
} from "./guards.js";
