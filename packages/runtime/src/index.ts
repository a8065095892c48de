/**
 * @shareport/runtime — Execution environment for Shareport components.
 *
 * - Environment: clock, height, chain id, global sequence, atomic scopes,
 *   event emission
 * - ReentrancyGuard: blocks re-entry into an operation family
 * - RoleRegistry, AssetToken, GuardedAssetRelay: in-process stand-ins for
 *   the external role checker, asset and asset relay
 */

export { Environment } from "./environment.js";
export type { Checkpointable, EnvironmentOptions } from "./environment.js";

export { ReentrancyGuard } from "./reentrancy-guard.js";
export { RoleRegistry } from "./role-registry.js";
export { AssetToken } from "./asset-token.js";
export type { AssetTokenConfig } from "./asset-token.js";
export { GuardedAssetRelay } from "./asset-relay.js";
export type { AssetRelay } from "./asset-relay.js";

export { toAddress, toNonZeroAddress } from "./address.js";
export { RuntimeError } from "./errors.js";
export type { RuntimeErrorCode } from "./errors.js";
