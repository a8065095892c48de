/**
 * ShareVault — a share token backed by externally valued assets.
 *
 * Deposits pull assets through the asset relay into the vault's own
 * custody and mint shares; withdrawals burn shares and release assets.
 * Every operation runs its hook pipeline before touching any balance, and
 * every share balance update (mint and burn included) runs the transfer
 * pipeline. A failing step aborts the whole operation.
 */

import type {
  Address,
  AuthorizationOracle,
  OperationTag,
  Role,
  ValuationSource,
} from "@shareport/types";
import { ZERO_ADDRESS } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { AssetRelay, AssetToken, Checkpointable, Environment } from "@shareport/runtime";
import { ReentrancyGuard, toAddress, toNonZeroAddress } from "@shareport/runtime";
import type { HookEntry, OperationHook, CommittedAssetsView } from "@shareport/hooks";
import { HookPipeline } from "@shareport/hooks";
import type { ShareVaultConfig } from "./types.js";
import { convertToAssets, convertToShares } from "./share-math.js";
import type { Rounding } from "./share-math.js";
import { CustodyValuation } from "./valuation.js";
import { VaultError } from "./errors.js";

interface ShareLedgerState {
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly allowances: ReadonlyMap<string, bigint>;
  readonly totalSupply: bigint;
}

export class ShareVault implements Checkpointable<ShareLedgerState>, CommittedAssetsView {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly asset: AssetToken;
  readonly hooks: HookPipeline;

  protected readonly env: Environment;
  protected readonly relay: AssetRelay;
  protected readonly authorization: AuthorizationOracle;
  protected readonly guard: ReentrancyGuard;
  protected readonly streamId: string;
  private readonly valuation: ValuationSource;

  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<string, bigint>();
  private _totalSupply = 0n;

  constructor(env: Environment, config: ShareVaultConfig) {
    this.env = env;
    this.address = toNonZeroAddress(config.address, "vault address");
    this.name = config.name;
    this.symbol = config.symbol;
    this.asset = config.asset;
    this.relay = config.relay;
    this.authorization = config.authorization;
    this.valuation = config.valuation ?? new CustodyValuation(config.asset, this.address);
    this.streamId = `vault:${this.address}`;
    this.guard = new ReentrancyGuard(`vault ${this.address}`);
    this.hooks = new HookPipeline(env, this.address);
    env.register(this);
  }

  get decimals(): number {
    return this.asset.decimals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Hook administration
  // ───────────────────────────────────────────────────────────────────────

  addHook(caller: Address, tag: OperationTag, hook: OperationHook | null | undefined): HookEntry {
    this.requireRole(caller, "hook-admin");
    return this.hooks.addHook(caller, tag, hook);
  }

  removeHook(caller: Address, tag: OperationTag, index: number): HookEntry {
    this.requireRole(caller, "hook-admin");
    return this.hooks.removeHook(caller, tag, index);
  }

  reorderHooks(caller: Address, tag: OperationTag, newOrder: readonly number[]): void {
    this.requireRole(caller, "hook-admin");
    this.hooks.reorder(caller, tag, newOrder);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounting
  // ───────────────────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  totalAssets(): bigint {
    return this.valuation.totalAssets(this._totalSupply);
  }

  /** Assets under management plus any already promised to the vault. */
  committedAssets(): bigint {
    return this.totalAssets();
  }

  balanceOf(account: string): bigint {
    return this._balances.get(toAddress(account, "account")) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this._allowances.get(allowanceKey(toAddress(owner, "owner"), toAddress(spender, "spender"))) ?? 0n;
  }

  convertToShares(assets: bigint, rounding: Rounding = "down"): bigint {
    return convertToShares(assets, this._totalSupply, this.totalAssets(), rounding);
  }

  convertToAssets(shares: bigint, rounding: Rounding = "down"): bigint {
    return convertToAssets(shares, this._totalSupply, this.totalAssets(), rounding);
  }

  previewDeposit(assets: bigint): bigint {
    return this.convertToShares(assets, "down");
  }

  previewMint(shares: bigint): bigint {
    return this.convertToAssets(shares, "up");
  }

  previewWithdraw(assets: bigint): bigint {
    return this.convertToShares(assets, "up");
  }

  previewRedeem(shares: bigint): bigint {
    return this.convertToAssets(shares, "down");
  }

  maxWithdraw(owner: string): bigint {
    return this.convertToAssets(this.balanceOf(owner), "down");
  }

  maxRedeem(owner: string): bigint {
    return this.balanceOf(owner);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit / withdraw family
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit `assets` and mint the corresponding shares to `receiver`.
   * @returns shares minted
   */
  deposit(caller: Address, assets: bigint, receiver: string): bigint {
    assertPositive(assets, "assets");
    const to = toNonZeroAddress(receiver, "receiver");
    return this.guard.run(() => {
      const shares = this.previewDeposit(assets);
      this._deposit(toAddress(caller, "caller"), to, assets, shares);
      return shares;
    });
  }

  /**
   * Mint exactly `shares` to `receiver`, pulling the assets they cost.
   * @returns assets pulled
   */
  mint(caller: Address, shares: bigint, receiver: string): bigint {
    assertPositive(shares, "shares");
    const to = toNonZeroAddress(receiver, "receiver");
    return this.guard.run(() => {
      const assets = this.previewMint(shares);
      this._deposit(toAddress(caller, "caller"), to, assets, shares);
      return assets;
    });
  }

  /**
   * Burn the shares worth `assets` from `owner` and send the assets to
   * `receiver`.
   * @returns shares burned
   */
  withdraw(caller: Address, assets: bigint, receiver: string, owner: string): bigint {
    assertPositive(assets, "assets");
    const to = toNonZeroAddress(receiver, "receiver");
    const from = toNonZeroAddress(owner, "owner");
    return this.guard.run(() => {
      const max = this.maxWithdraw(from);
      if (assets > max) {
        throw new VaultError(
          "EXCEEDED_MAX_WITHDRAW",
          `${from} can withdraw at most ${max} assets, requested ${assets}`,
        );
      }
      const shares = this.previewWithdraw(assets);
      this._withdraw(toAddress(caller, "caller"), to, from, assets, shares);
      return shares;
    });
  }

  /**
   * Burn `shares` from `owner` and send their assets to `receiver`.
   * @returns assets released
   */
  redeem(caller: Address, shares: bigint, receiver: string, owner: string): bigint {
    return this.guard.run(() => this.redeemUnguarded(caller, shares, receiver, owner));
  }

  protected redeemUnguarded(caller: Address, shares: bigint, receiver: string, owner: string): bigint {
    assertPositive(shares, "shares");
    const to = toNonZeroAddress(receiver, "receiver");
    const from = toNonZeroAddress(owner, "owner");
    const max = this.maxRedeem(from);
    if (shares > max) {
      throw new VaultError("EXCEEDED_MAX_REDEEM", `${from} can redeem at most ${max} shares, requested ${shares}`);
    }
    const assets = this.previewRedeem(shares);
    this._withdraw(toAddress(caller, "caller"), to, from, assets, shares);
    return assets;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Share token
  // ───────────────────────────────────────────────────────────────────────

  transfer(caller: Address, to: string, amount: bigint): boolean {
    assertNonNegative(amount, "amount");
    const sender = toNonZeroAddress(caller, "sender");
    const recipient = toNonZeroAddress(to, "recipient");
    this.env.atomic(() => this._update(sender, recipient, amount));
    return true;
  }

  transferFrom(caller: Address, from: string, to: string, amount: bigint): boolean {
    assertNonNegative(amount, "amount");
    const spender = toNonZeroAddress(caller, "spender");
    const sender = toNonZeroAddress(from, "sender");
    const recipient = toNonZeroAddress(to, "recipient");
    this.env.atomic(() => {
      this._spendAllowance(sender, spender, amount);
      this._update(sender, recipient, amount);
    });
    return true;
  }

  approve(caller: Address, spender: string, amount: bigint): boolean {
    assertNonNegative(amount, "amount");
    const owner = toNonZeroAddress(caller, "owner");
    const approved = toNonZeroAddress(spender, "spender");
    this.env.atomic(() => {
      this._allowances.set(allowanceKey(owner, approved), amount);
      this.env.emit(this.streamId, SHAREPORT_EVENTS.SHARES_APPROVED, "vault", owner, {
        owner,
        spender: approved,
        amount: amount.toString(),
      });
    });
    return true;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpointable
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): ShareLedgerState {
    return {
      balances: new Map(this._balances),
      allowances: new Map(this._allowances),
      totalSupply: this._totalSupply,
    };
  }

  restore(state: ShareLedgerState): void {
    this._balances = new Map(state.balances);
    this._allowances = new Map(state.allowances);
    this._totalSupply = state.totalSupply;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals shared with subclasses
  // ───────────────────────────────────────────────────────────────────────

  protected _deposit(caller: Address, receiver: Address, assets: bigint, shares: bigint): void {
    this.env.atomic(() => {
      this.hooks.assertAll({
        tag: "deposit",
        context: { token: this.address, operator: caller, assets, receiver },
      });
      this.relay.pull(this.address, this.asset.address, caller, this.address, assets);
      this._update(ZERO_ADDRESS, receiver, shares);
      this.hooks.markExecuted("deposit");

      this.env.emit(this.streamId, SHAREPORT_EVENTS.SHARES_DEPOSITED, "vault", caller, {
        sender: caller,
        owner: receiver,
        assets: assets.toString(),
        shares: shares.toString(),
      });
    });
  }

  protected _withdraw(
    caller: Address,
    receiver: Address,
    owner: Address,
    assets: bigint,
    shares: bigint,
  ): void {
    this.env.atomic(() => {
      this.hooks.assertAll({
        tag: "withdraw",
        context: { token: this.address, operator: caller, assets, receiver, owner },
      });
      if (caller !== owner) {
        this._spendAllowance(owner, caller, shares);
      }
      this._update(owner, ZERO_ADDRESS, shares);
      this.asset.transfer(this.address, receiver, assets);
      this.hooks.markExecuted("withdraw");

      this.env.emit(this.streamId, SHAREPORT_EVENTS.SHARES_WITHDRAWN, "vault", caller, {
        sender: caller,
        receiver,
        owner,
        assets: assets.toString(),
        shares: shares.toString(),
      });
    });
  }

  /**
   * Move `amount` shares. The zero address as `from` mints, as `to` burns.
   */
  protected _update(from: Address, to: Address, amount: bigint): void {
    this.hooks.assertAll({
      tag: "transfer",
      context: { token: this.address, from, to, amount },
    });

    if (from === ZERO_ADDRESS) {
      this._totalSupply += amount;
    } else {
      const balance = this._balances.get(from) ?? 0n;
      if (balance < amount) {
        throw new VaultError("INSUFFICIENT_SHARES", `${from} holds ${balance} ${this.symbol}, needs ${amount}`);
      }
      this._balances.set(from, balance - amount);
    }

    if (to === ZERO_ADDRESS) {
      this._totalSupply -= amount;
    } else {
      this._balances.set(to, (this._balances.get(to) ?? 0n) + amount);
    }

    this.hooks.markExecuted("transfer");
    this.env.emit(this.streamId, SHAREPORT_EVENTS.SHARES_TRANSFERRED, "vault", from === ZERO_ADDRESS ? to : from, {
      from,
      to,
      amount: amount.toString(),
    });
  }

  protected _spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const key = allowanceKey(owner, spender);
    const allowed = this._allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new VaultError(
        "INSUFFICIENT_SHARE_ALLOWANCE",
        `${spender} may move ${allowed} ${this.symbol} of ${owner}, needs ${amount}`,
      );
    }
    if (allowed !== MAX_UINT256) {
      this._allowances.set(key, allowed - amount);
    }
  }

  protected requireRole(caller: Address, role: Role): void {
    if (!this.authorization.isAuthorized(caller, role)) {
      throw new VaultError("UNAUTHORIZED", `${caller} lacks the ${role} role`);
    }
  }
}

const MAX_UINT256 = 2n ** 256n - 1n;

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

export function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new VaultError("INVALID_AMOUNT", `${label} must be positive, got ${amount}`);
  }
}

function assertNonNegative(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new VaultError("INVALID_AMOUNT", `${label} must not be negative, got ${amount}`);
  }
}
