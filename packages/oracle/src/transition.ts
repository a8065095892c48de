/**
 * Transition math.
 *
 * Pure functions over an OracleState snapshot. The stateful oracle only
 * ever replaces its snapshot with the result of one of these.
 *
 * The rate of a gradual transition is measured against the price the
 * transition started from, not against the remaining distance, so a
 * larger jump takes proportionally longer.
 */

import type { OracleState, PriceUpdateOutcome } from "./types.js";
import { BPS } from "./types.js";
import { OracleError } from "./errors.js";

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

function elapsedSince(state: OracleState, now: bigint): bigint {
  return now > state.lastUpdateAt ? now - state.lastUpdateAt : 0n;
}

export function inTransition(state: OracleState): boolean {
  return state.transitionStartPrice !== state.targetPrice;
}

/**
 * Relative distance between `from` and `to`, in basis points of `from`.
 */
export function deviationBps(from: bigint, to: bigint): bigint {
  return (abs(to - from) * BPS) / from;
}

interface Progress {
  readonly neededBps: bigint;
  readonly progressBps: bigint;
}

function progressOf(state: OracleState, now: bigint): Progress {
  const neededBps = deviationBps(state.transitionStartPrice, state.targetPrice);
  const elapsedBps = (elapsedSince(state, now) * state.maxDeviationBpsPerPeriod) / state.periodSeconds;
  return { neededBps, progressBps: elapsedBps < neededBps ? elapsedBps : neededBps };
}

/**
 * Interpolated price at `now`.
 *
 * Moves from the start price towards the target at most
 * `maxDeviationBpsPerPeriod` of the start price per period, and returns
 * exactly the target once the needed distance is covered.
 */
export function priceAt(state: OracleState, now: bigint): bigint {
  if (!inTransition(state)) {
    return state.targetPrice;
  }

  const { neededBps, progressBps } = progressOf(state, now);
  if (progressBps >= neededBps) {
    return state.targetPrice;
  }

  const step = (state.transitionStartPrice * progressBps) / BPS;
  return state.targetPrice > state.transitionStartPrice
    ? state.transitionStartPrice + step
    : state.transitionStartPrice - step;
}

/**
 * Transition progress as a fraction of 10000. 10000 when idle.
 */
export function transitionProgressAt(state: OracleState, now: bigint): bigint {
  if (!inTransition(state)) {
    return BPS;
  }
  const { neededBps, progressBps } = progressOf(state, now);
  if (neededBps === 0n) {
    return BPS;
  }
  return (progressBps * BPS) / neededBps;
}

/**
 * Apply a reported price.
 *
 * Within the period's remaining budget the price takes effect at once and
 * consumes budget. Otherwise a gradual transition starts from the current
 * interpolated price and the budget is left as it was.
 */
export function applyPriceUpdate(state: OracleState, newPrice: bigint, now: bigint): PriceUpdateOutcome {
  if (newPrice <= 0n) {
    throw new OracleError("INVALID_PRICE", `Price must be positive, got ${newPrice}`);
  }

  const current = priceAt(state, now);
  const applied =
    elapsedSince(state, now) >= state.periodSeconds ? 0n : state.appliedChangeBpsInPeriod;
  const deltaBps = deviationBps(current, newPrice);

  if (applied + deltaBps <= state.maxDeviationBpsPerPeriod) {
    return {
      immediate: true,
      deltaBps,
      state: {
        ...state,
        targetPrice: newPrice,
        transitionStartPrice: newPrice,
        appliedChangeBpsInPeriod: applied + deltaBps,
        lastUpdateAt: now,
        round: state.round + 1,
      },
    };
  }

  return {
    immediate: false,
    deltaBps,
    state: {
      ...state,
      targetPrice: newPrice,
      transitionStartPrice: current,
      appliedChangeBpsInPeriod: applied,
      lastUpdateAt: now,
      round: state.round + 1,
    },
  };
}

/**
 * Change the deviation policy without moving the price.
 */
export function applyPolicyChange(
  state: OracleState,
  maxDeviationBps: bigint,
  periodSeconds: bigint,
  now: bigint,
): OracleState {
  assertPolicy(maxDeviationBps, periodSeconds);
  return {
    ...state,
    transitionStartPrice: inTransition(state) ? priceAt(state, now) : state.transitionStartPrice,
    appliedChangeBpsInPeriod: 0n,
    lastUpdateAt: now,
    maxDeviationBpsPerPeriod: maxDeviationBps,
    periodSeconds,
  };
}

/**
 * Collapse any in-progress transition onto its target.
 */
export function completeTransition(state: OracleState, now: bigint): OracleState {
  return { ...state, transitionStartPrice: state.targetPrice, lastUpdateAt: now };
}

export function assertPolicy(maxDeviationBps: bigint, periodSeconds: bigint): void {
  if (maxDeviationBps <= 0n) {
    throw new OracleError("INVALID_POLICY", `Max deviation must be positive, got ${maxDeviationBps} bps`);
  }
  if (periodSeconds <= 0n) {
    throw new OracleError("INVALID_POLICY", `Period must be positive, got ${periodSeconds}s`);
  }
}
