/**
 * Roles & Authorization
 *
 * The coarse role checker is an external collaborator. Components only
 * ever ask it one question: may `caller` act as `role`?
 */

import type { Address } from "./address.js";

/** Privileged capabilities recognised across the stack. */
export type Role =
  | "hook-admin"          // Add, remove and reorder operation hooks
  | "vault-operator"      // Managed redeem and batch redeem
  | "deposit-operator"    // Accept and refund escrowed deposits
  | "withdrawal-operator"; // Submit owner-signed withdrawal requests

export const ROLES: readonly Role[] = [
  "hook-admin",
  "vault-operator",
  "deposit-operator",
  "withdrawal-operator",
];

/**
 * Authorization oracle consulted by privileged entry points.
 */
export interface AuthorizationOracle {
  isAuthorized(caller: Address, role: Role): boolean;
}
