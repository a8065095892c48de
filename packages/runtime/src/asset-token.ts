/**
 * AssetToken — in-process fungible token balances.
 *
 * Models the underlying asset the vault accepts: balances and allowances
 * in base units, with `transfer` / `transferFrom` semantics. Balances take
 * part in atomic scopes so a failed vault operation never leaves assets
 * half-moved.
 */

import type { Address } from "@shareport/types";
import type { Checkpointable, Environment } from "./environment.js";
import { toAddress, toNonZeroAddress } from "./address.js";
import { RuntimeError } from "./errors.js";

export interface AssetTokenConfig {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
}

interface AssetTokenState {
  readonly balances: Map<Address, bigint>;
  readonly allowances: Map<string, bigint>;
  readonly totalSupply: bigint;
}

const MAX_UINT256 = 2n ** 256n - 1n;

export class AssetToken implements Checkpointable<AssetTokenState> {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;

  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<string, bigint>();
  private _totalSupply = 0n;

  constructor(config: AssetTokenConfig, env: Environment) {
    this.address = toNonZeroAddress(config.address, "asset address");
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    env.register(this);
  }

  // ─── Queries ────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: string): bigint {
    return this._balances.get(toAddress(account, "account")) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this._allowances.get(allowanceKey(toAddress(owner), toAddress(spender))) ?? 0n;
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  /**
   * Create new units. Issuance is outside the protocol; this exists to
   * fund accounts.
   */
  mint(to: string, amount: bigint): void {
    assertAmount(amount);
    const recipient = toNonZeroAddress(to, "recipient");
    this._balances.set(recipient, this.balanceOf(recipient) + amount);
    this._totalSupply += amount;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    assertAmount(amount);
    this._allowances.set(
      allowanceKey(toNonZeroAddress(owner, "owner"), toNonZeroAddress(spender, "spender")),
      amount,
    );
  }

  transfer(from: string, to: string, amount: bigint): void {
    assertAmount(amount);
    const sender = toNonZeroAddress(from, "sender");
    const recipient = toNonZeroAddress(to, "recipient");
    const balance = this.balanceOf(sender);
    if (balance < amount) {
      throw new RuntimeError(
        "INSUFFICIENT_BALANCE",
        `${sender} holds ${balance} ${this.symbol}, needs ${amount}`,
      );
    }
    this._balances.set(sender, balance - amount);
    this._balances.set(recipient, this.balanceOf(recipient) + amount);
  }

  /**
   * Move `amount` from `from` to `to` on behalf of `spender`.
   * An allowance of 2^256-1 is never decreased.
   */
  transferFrom(spender: string, from: string, to: string, amount: bigint): void {
    const key = allowanceKey(toNonZeroAddress(from, "sender"), toNonZeroAddress(spender, "spender"));
    const allowed = this._allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new RuntimeError(
        "INSUFFICIENT_ALLOWANCE",
        `${spender} may move ${allowed} ${this.symbol} from ${from}, needs ${amount}`,
      );
    }
    this.transfer(from, to, amount);
    if (allowed !== MAX_UINT256) {
      this._allowances.set(key, allowed - amount);
    }
  }

  // ─── Checkpointable ─────────────────────────────────────────────────

  checkpoint(): AssetTokenState {
    return {
      balances: new Map(this._balances),
      allowances: new Map(this._allowances),
      totalSupply: this._totalSupply,
    };
  }

  restore(state: AssetTokenState): void {
    this._balances = new Map(state.balances);
    this._allowances = new Map(state.allowances);
    this._totalSupply = state.totalSupply;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

function assertAmount(amount: bigint): void {
  if (amount < 0n || amount > MAX_UINT256) {
    throw new RuntimeError("INVALID_AMOUNT", `Amount out of range: ${amount}`);
  }
}
