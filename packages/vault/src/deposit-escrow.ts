/**
 * DepositEscrow — two-phase deposits.
 *
 * Lifecycle of a deposit:
 *
 *   PENDING ──accept──▶ ACCEPTED
 *      │
 *      ├──refund───▶ REFUNDED
 *      └──reclaim──▶ REFUNDED
 *
 * Exactly one transition leaves PENDING; terminal states never change.
 *
 * Operators (deposit-operator role) accept or refund. Each operator call
 * advances the round by one, single or batch. A depositor may reclaim a
 * pending deposit once it has expired, or once any operator round has
 * passed since it was created.
 *
 * Invariant: totalPendingAssets == Σ userPendingAssets
 *            == Σ assetAmount of PENDING deposits
 *            == escrow custody balance of the asset
 */

import { encodeAbiParameters, keccak256 } from "viem";
import type { Address, AuthorizationOracle, Hex } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { AssetToken, Checkpointable, Environment } from "@shareport/runtime";
import { toAddress, toNonZeroAddress } from "@shareport/runtime";
import type {
  DepositEscrowConfig,
  DepositState,
  EscrowedShareMinter,
  PendingDeposit,
} from "./types.js";
import { EscrowError } from "./errors.js";

interface EscrowState {
  readonly deposits: ReadonlyMap<Hex, PendingDeposit>;
  readonly userDepositIds: ReadonlyMap<Address, readonly Hex[]>;
  readonly userPendingAssets: ReadonlyMap<Address, bigint>;
  readonly userNonces: ReadonlyMap<Address, bigint>;
  readonly totalPendingAssets: bigint;
  readonly round: number;
}

export class DepositEscrow implements Checkpointable<EscrowState> {
  readonly address: Address;
  readonly expirationSeconds: bigint;

  private readonly env: Environment;
  private readonly vault: EscrowedShareMinter;
  private readonly asset: AssetToken;
  private readonly authorization: AuthorizationOracle;
  private readonly streamId: string;

  private _deposits = new Map<Hex, PendingDeposit>();
  private _userDepositIds = new Map<Address, Hex[]>();
  private _userPendingAssets = new Map<Address, bigint>();
  private _userNonces = new Map<Address, bigint>();
  private _totalPendingAssets = 0n;
  private _round = 0;

  constructor(env: Environment, config: DepositEscrowConfig) {
    if (config.expirationSeconds <= 0n) {
      throw new EscrowError(
        "INVALID_AMOUNT",
        `Deposit expiration must be positive, got ${config.expirationSeconds}s`,
      );
    }
    this.env = env;
    this.address = toNonZeroAddress(config.address, "escrow address");
    this.vault = config.vault;
    this.asset = config.asset;
    this.authorization = config.authorization;
    this.expirationSeconds = config.expirationSeconds;
    this.streamId = `escrow:${this.address}`;
    env.register(this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recording (vault only)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record a deposit whose assets the vault has already moved into escrow
   * custody.
   */
  recordDeposit(caller: Address, depositor: Address, recipient: Address, assetAmount: bigint): Hex {
    if (toAddress(caller, "caller") !== this.vault.address) {
      throw new EscrowError("UNAUTHORIZED", `${caller} is not the escrow's vault`);
    }
    if (assetAmount <= 0n) {
      throw new EscrowError("INVALID_AMOUNT", `Deposit amount must be positive, got ${assetAmount}`);
    }

    return this.env.atomic(() => {
      const nonce = this._userNonces.get(depositor) ?? 0n;
      const createdAt = this.env.timestamp;
      const id = keccak256(
        encodeAbiParameters(
          [
            { type: "address" },
            { type: "address" },
            { type: "uint256" },
            { type: "uint256" },
            { type: "address" },
            { type: "uint256" },
          ],
          [depositor, recipient, assetAmount, createdAt, this.vault.address, nonce],
        ),
      );

      const deposit: PendingDeposit = {
        id,
        depositor,
        recipient,
        assetAmount,
        expirationTime: createdAt + this.expirationSeconds,
        state: "PENDING",
        roundAtCreation: this._round,
        createdAt,
      };
      this._deposits.set(id, deposit);
      this._userNonces.set(depositor, nonce + 1n);
      this._userDepositIds.set(depositor, [...(this._userDepositIds.get(depositor) ?? []), id]);
      this._userPendingAssets.set(depositor, this.userPendingAssets(depositor) + assetAmount);
      this._totalPendingAssets += assetAmount;

      this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_PENDING, "escrow", depositor, {
        depositId: id,
        depositor,
        recipient,
        assetAmount: assetAmount.toString(),
        expirationTime: deposit.expirationTime.toString(),
        roundAtCreation: deposit.roundAtCreation,
      });
      return id;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operator resolution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accept a pending deposit: its assets join vault custody and the
   * recipient receives shares.
   * @returns shares minted
   */
  acceptDeposit(caller: Address, id: Hex): bigint {
    this.requireOperator(caller);

    return this.env.atomic(() => {
      const deposit = this.settle(id, "ACCEPTED");
      const shares = this.vault.mintShares(this.address, deposit.recipient, deposit.assetAmount);
      this.asset.transfer(this.address, this.vault.address, deposit.assetAmount);
      const round = this.nextRound();

      this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_ACCEPTED, "escrow", caller, {
        depositId: id,
        recipient: deposit.recipient,
        assetAmount: deposit.assetAmount.toString(),
        round,
      });
      return shares;
    });
  }

  /**
   * Accept several deposits in one round. Shares are priced once for the
   * whole batch.
   * @returns shares minted per deposit, in input order
   */
  batchAcceptDeposits(caller: Address, ids: readonly Hex[]): bigint[] {
    this.requireOperator(caller);
    requireNonEmpty(ids);

    return this.env.atomic(() => {
      const deposits = ids.map((id) => this.settle(id, "ACCEPTED"));
      const shares = this.vault.batchMintShares(
        this.address,
        deposits.map((d) => d.recipient),
        deposits.map((d) => d.assetAmount),
      );
      const total = sumAssets(deposits);
      this.asset.transfer(this.address, this.vault.address, total);
      const round = this.nextRound();

      for (const deposit of deposits) {
        this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_ACCEPTED, "escrow", caller, {
          depositId: deposit.id,
          recipient: deposit.recipient,
          assetAmount: deposit.assetAmount.toString(),
          round,
        });
      }
      this.env.emit(this.streamId, SHAREPORT_EVENTS.BATCH_ACCEPTED, "escrow", caller, {
        depositIds: [...ids],
        totalAssets: total.toString(),
        round,
      });
      return shares;
    });
  }

  /**
   * Send a pending deposit's assets back to its depositor.
   */
  refundDeposit(caller: Address, id: Hex): void {
    this.requireOperator(caller);

    this.env.atomic(() => {
      const deposit = this.settle(id, "REFUNDED");
      this.asset.transfer(this.address, deposit.depositor, deposit.assetAmount);
      const round = this.nextRound();

      this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_REFUNDED, "escrow", caller, {
        depositId: id,
        depositor: deposit.depositor,
        assetAmount: deposit.assetAmount.toString(),
        round,
      });
    });
  }

  batchRefundDeposits(caller: Address, ids: readonly Hex[]): void {
    this.requireOperator(caller);
    requireNonEmpty(ids);

    this.env.atomic(() => {
      const deposits = ids.map((id) => this.settle(id, "REFUNDED"));
      for (const deposit of deposits) {
        this.asset.transfer(this.address, deposit.depositor, deposit.assetAmount);
      }
      const round = this.nextRound();

      for (const deposit of deposits) {
        this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_REFUNDED, "escrow", caller, {
          depositId: deposit.id,
          depositor: deposit.depositor,
          assetAmount: deposit.assetAmount.toString(),
          round,
        });
      }
      this.env.emit(this.streamId, SHAREPORT_EVENTS.BATCH_REFUNDED, "escrow", caller, {
        depositIds: [...ids],
        totalAssets: sumAssets(deposits).toString(),
        round,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Depositor exit
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take back a deposit no operator has resolved. Allowed once it has
   * expired or once an operator round has passed since it was made.
   * Does not advance the round.
   */
  reclaimDeposit(caller: Address, id: Hex): void {
    const deposit = this.find(id);
    if (toAddress(caller, "caller") !== deposit.depositor) {
      throw new EscrowError("UNAUTHORIZED", `Only the depositor ${deposit.depositor} may reclaim ${id}`);
    }
    if (deposit.state !== "PENDING") {
      throw new EscrowError("DEPOSIT_NOT_PENDING", `Deposit ${id} is ${deposit.state}`);
    }
    if (!this.isReclaimable(deposit)) {
      throw new EscrowError(
        "DEPOSIT_NOT_RECLAIMABLE",
        `Deposit ${id} expires at ${deposit.expirationTime} and no round has passed since round ${deposit.roundAtCreation}`,
      );
    }

    this.env.atomic(() => {
      this.settle(id, "REFUNDED");
      this.asset.transfer(this.address, deposit.depositor, deposit.assetAmount);

      this.env.emit(this.streamId, SHAREPORT_EVENTS.DEPOSIT_RECLAIMED, "escrow", caller, {
        depositId: id,
        depositor: deposit.depositor,
        assetAmount: deposit.assetAmount.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getDeposit(id: Hex): PendingDeposit | undefined {
    return this._deposits.get(id);
  }

  getUserDepositIds(user: string): readonly Hex[] {
    return [...(this._userDepositIds.get(toAddress(user, "user")) ?? [])];
  }

  getUserPendingDeposits(user: string): readonly PendingDeposit[] {
    return this.getUserDepositIds(user)
      .map((id) => this._deposits.get(id))
      .filter((d): d is PendingDeposit => d !== undefined && d.state === "PENDING");
  }

  get totalPendingAssets(): bigint {
    return this._totalPendingAssets;
  }

  userPendingAssets(user: string): bigint {
    return this._userPendingAssets.get(toAddress(user, "user")) ?? 0n;
  }

  get currentRound(): number {
    return this._round;
  }

  isReclaimable(deposit: PendingDeposit): boolean {
    return (
      deposit.state === "PENDING" &&
      (this.env.timestamp >= deposit.expirationTime || this._round > deposit.roundAtCreation)
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpointable
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): EscrowState {
    return {
      deposits: new Map(this._deposits),
      userDepositIds: new Map(this._userDepositIds),
      userPendingAssets: new Map(this._userPendingAssets),
      userNonces: new Map(this._userNonces),
      totalPendingAssets: this._totalPendingAssets,
      round: this._round,
    };
  }

  restore(state: EscrowState): void {
    this._deposits = new Map(state.deposits);
    this._userDepositIds = new Map([...state.userDepositIds].map(([user, ids]) => [user, [...ids]]));
    this._userPendingAssets = new Map(state.userPendingAssets);
    this._userNonces = new Map(state.userNonces);
    this._totalPendingAssets = state.totalPendingAssets;
    this._round = state.round;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private find(id: Hex): PendingDeposit {
    const deposit = this._deposits.get(id);
    if (deposit === undefined) {
      throw new EscrowError("DEPOSIT_NOT_FOUND", `No deposit with id ${id}`);
    }
    return deposit;
  }

  /**
   * Move a PENDING deposit to a terminal state and take it off the ledger.
   */
  private settle(id: Hex, state: Exclude<DepositState, "PENDING">): PendingDeposit {
    const deposit = this.find(id);
    if (deposit.state !== "PENDING") {
      throw new EscrowError("DEPOSIT_NOT_PENDING", `Deposit ${id} is ${deposit.state}`);
    }

    this._deposits.set(id, { ...deposit, state });
    this._userPendingAssets.set(
      deposit.depositor,
      this.userPendingAssets(deposit.depositor) - deposit.assetAmount,
    );
    this._totalPendingAssets -= deposit.assetAmount;
    return deposit;
  }

  private nextRound(): number {
    this._round += 1;
    return this._round;
  }

  private requireOperator(caller: Address): void {
    if (!this.authorization.isAuthorized(caller, "deposit-operator")) {
      throw new EscrowError("UNAUTHORIZED", `${caller} lacks the deposit-operator role`);
    }
  }
}

function requireNonEmpty(ids: readonly Hex[]): void {
  if (ids.length === 0) {
    throw new EscrowError("EMPTY_BATCH", "Batch needs at least one deposit id");
  }
}

function sumAssets(deposits: readonly PendingDeposit[]): bigint {
  return deposits.reduce((sum, d) => sum + d.assetAmount, 0n);
}
