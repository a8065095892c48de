/**
 * RoleRegistry — in-process authorization oracle.
 *
 * Stands in for the external role checker. Grants are plain address→role
 * sets; there is no role hierarchy.
 */

import type { Address, AuthorizationOracle, Role } from "@shareport/types";
import { toAddress } from "./address.js";

export class RoleRegistry implements AuthorizationOracle {
  private readonly _grants = new Map<Address, Set<Role>>();

  grant(account: string, role: Role): void {
    const address = toAddress(account, "account");
    const roles = this._grants.get(address) ?? new Set<Role>();
    roles.add(role);
    this._grants.set(address, roles);
  }

  revoke(account: string, role: Role): void {
    const address = toAddress(account, "account");
    this._grants.get(address)?.delete(role);
  }

  isAuthorized(caller: Address, role: Role): boolean {
    return this._grants.get(toAddress(caller, "caller"))?.has(role) ?? false;
  }

  rolesOf(account: string): readonly Role[] {
    return [...(this._grants.get(toAddress(account, "account")) ?? [])].sort();
  }
}
