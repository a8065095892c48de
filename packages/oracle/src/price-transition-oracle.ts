/**
 * PriceTransitionOracle — a price feed that cannot jump.
 *
 * Updaters report target prices. Small moves apply at once until the
 * period's deviation budget is spent; anything beyond it becomes a linear
 * transition the current price follows at a bounded rate.
 *
 * The owner manages the updater set and the deviation policy, and can
 * force a running transition to complete.
 */

import { encodeAbiParameters } from "viem";
import type { Address, Hex, PriceReporter } from "@shareport/types";
import { SHAREPORT_EVENTS } from "@shareport/event-store";
import type { Checkpointable, Environment } from "@shareport/runtime";
import { toNonZeroAddress } from "@shareport/runtime";
import type { OracleConfig, OracleState } from "./types.js";
import {
  applyPolicyChange,
  applyPriceUpdate,
  assertPolicy,
  completeTransition,
  priceAt,
  transitionProgressAt,
} from "./transition.js";
import { OracleError } from "./errors.js";

interface OracleSnapshot {
  readonly state: OracleState;
  readonly updaters: ReadonlySet<Address>;
}

export class PriceTransitionOracle implements PriceReporter, Checkpointable<OracleSnapshot> {
  readonly address: Address;
  readonly owner: Address;

  private readonly env: Environment;
  private readonly streamId: string;
  private _state: OracleState;
  private _updaters = new Set<Address>();

  constructor(env: Environment, config: OracleConfig) {
    if (config.initialPrice <= 0n) {
      throw new OracleError("INVALID_PRICE", `Initial price must be positive, got ${config.initialPrice}`);
    }
    assertPolicy(config.maxDeviationBps, config.periodSeconds);

    this.env = env;
    this.address = toNonZeroAddress(config.address, "oracle address");
    this.owner = toNonZeroAddress(config.owner, "oracle owner");
    this.streamId = `oracle:${this.address}`;
    this._state = {
      targetPrice: config.initialPrice,
      transitionStartPrice: config.initialPrice,
      lastUpdateAt: env.timestamp,
      maxDeviationBpsPerPeriod: config.maxDeviationBps,
      periodSeconds: config.periodSeconds,
      appliedChangeBpsInPeriod: 0n,
      round: 0,
    };
    env.register(this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Updates
  // ───────────────────────────────────────────────────────────────────────

  update(caller: Address, newPrice: bigint, source: string): void {
    this.requireUpdater(caller);
    if (source.trim().length === 0) {
      throw new OracleError("EMPTY_SOURCE", "Price update needs a non-empty source");
    }

    this.env.atomic(() => {
      const outcome = applyPriceUpdate(this._state, newPrice, this.env.timestamp);
      this._state = outcome.state;

      this.env.emit(this.streamId, SHAREPORT_EVENTS.PRICE_UPDATED, "oracle", caller, {
        round: outcome.state.round,
        targetPrice: outcome.state.targetPrice.toString(),
        transitionStartPrice: outcome.state.transitionStartPrice.toString(),
        source,
        immediate: outcome.immediate,
      });
    });
  }

  setMaxDeviation(caller: Address, maxDeviationBps: bigint, periodSeconds: bigint): void {
    this.requireOwner(caller);

    this.env.atomic(() => {
      const previous = this._state;
      this._state = applyPolicyChange(previous, maxDeviationBps, periodSeconds, this.env.timestamp);

      this.env.emit(this.streamId, SHAREPORT_EVENTS.POLICY_UPDATED, "oracle", caller, {
        oldMaxDeviationBps: previous.maxDeviationBpsPerPeriod.toString(),
        newMaxDeviationBps: maxDeviationBps.toString(),
        oldPeriodSeconds: previous.periodSeconds.toString(),
        newPeriodSeconds: periodSeconds.toString(),
      });
    });
  }

  forceCompleteTransition(caller: Address): void {
    this.requireOwner(caller);

    this.env.atomic(() => {
      this._state = completeTransition(this._state, this.env.timestamp);
      this.env.emit(this.streamId, SHAREPORT_EVENTS.TRANSITION_COMPLETED, "oracle", caller, {
        price: this._state.targetPrice.toString(),
      });
    });
  }

  /**
   * Authorize or revoke a price updater. The owner always remains one.
   */
  setUpdater(caller: Address, updater: string, allowed: boolean): void {
    this.requireOwner(caller);
    const account = toNonZeroAddress(updater, "updater");

    this.env.atomic(() => {
      if (allowed) {
        this._updaters.add(account);
      } else {
        this._updaters.delete(account);
      }
      this.env.emit(this.streamId, SHAREPORT_EVENTS.UPDATER_SET, "oracle", caller, {
        updater: account,
        allowed,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getCurrentPrice(): bigint {
    return priceAt(this._state, this.env.timestamp);
  }

  /** Progress of the running transition, out of 10000. */
  getTransitionProgress(): bigint {
    return transitionProgressAt(this._state, this.env.timestamp);
  }

  getState(): OracleState {
    return this._state;
  }

  isUpdater(account: Address): boolean {
    return account === this.owner || this._updaters.has(account);
  }

  /**
   * Current price ABI-encoded as a single uint256.
   */
  report(): Hex {
    return encodeAbiParameters([{ type: "uint256" }], [this.getCurrentPrice()]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpointable
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): OracleSnapshot {
    return { state: this._state, updaters: new Set(this._updaters) };
  }

  restore(snapshot: OracleSnapshot): void {
    this._state = snapshot.state;
    this._updaters = new Set(snapshot.updaters);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new OracleError("UNAUTHORIZED", `${caller} is not the oracle owner`);
    }
  }

  private requireUpdater(caller: Address): void {
    if (!this.isUpdater(caller)) {
      throw new OracleError("UNAUTHORIZED", `${caller} is not an authorized price updater`);
    }
  }
}
