/**
 * Property-Based Tests for the transition math
 *
 * 1. Monotonic convergence: the price moves monotonically from start to
 *    target, never overshoots, and is exactly the target from the first
 *    instant the needed distance is covered
 * 2. Batching resistance: with the clock frozen, any run of updates never
 *    moves the price by more than the period budget in total
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  applyPriceUpdate,
  completeTransition,
  deviationBps,
  priceAt,
  transitionProgressAt,
} from "../src/transition.js";
import type { OracleState } from "../src/types.js";

const T0 = 1_700_000_000n;

function transition(start: bigint, target: bigint, maxBps: bigint, period: bigint): OracleState {
  return {
    targetPrice: target,
    transitionStartPrice: start,
    lastUpdateAt: T0,
    maxDeviationBpsPerPeriod: maxBps,
    periodSeconds: period,
    appliedChangeBpsInPeriod: 0n,
    round: 1,
  };
}

const arbPrice = fc.bigInt({ min: 1_000n, max: 10n ** 24n });
const arbBps = fc.bigInt({ min: 1n, max: 10_000n });
const arbPeriod = fc.bigInt({ min: 1n, max: 86_400n });

describe("priceAt", () => {
  it("returns the target when idle", () => {
    expect(priceAt(transition(5n, 5n, 100n, 60n), T0 + 1_000n)).toBe(5n);
  });

  it("converges monotonically and lands exactly on the target", () => {
    fc.assert(
      fc.property(
        arbPrice,
        arbPrice,
        arbBps,
        arbPeriod,
        fc.array(fc.bigInt({ min: 0n, max: 10_000_000n }), { minLength: 1, maxLength: 20 }),
        (start, target, maxBps, period, offsets) => {
          fc.pre(start !== target);
          const state = transition(start, target, maxBps, period);
          const rising = target > start;
          const times = [...offsets].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

          let previous = start;
          for (const offset of times) {
            const price = priceAt(state, T0 + offset);
            if (rising) {
              expect(price >= previous && price <= target).toBe(true);
            } else {
              expect(price <= previous && price >= target).toBe(true);
            }
            previous = price;
          }

          const needed = deviationBps(start, target);
          const arrival = (needed * period + maxBps - 1n) / maxBps;
          expect(priceAt(state, T0 + arrival)).toBe(target);
          expect(transitionProgressAt(state, T0 + arrival)).toBe(10_000n);
        },
      ),
    );
  });

  it("does not move before time passes", () => {
    fc.assert(
      fc.property(arbPrice, arbPrice, arbBps, arbPeriod, (start, target, maxBps, period) => {
        fc.pre(start !== target && deviationBps(start, target) > 0n);
        expect(priceAt(transition(start, target, maxBps, period), T0)).toBe(start);
      }),
    );
  });
});

describe("applyPriceUpdate", () => {
  it("never applies more than the period budget while the clock is frozen", () => {
    fc.assert(
      fc.property(
        arbBps,
        fc.array(fc.integer({ min: -500, max: 500 }), { minLength: 1, maxLength: 30 }),
        (maxBps, moves) => {
          let state = transition(10n ** 18n, 10n ** 18n, maxBps, 3_600n);
          let immediateBps = 0n;

          for (const move of moves) {
            const current = priceAt(state, T0);
            const next = current + (current * BigInt(move)) / 10_000n;
            const outcome = applyPriceUpdate(state, next, T0);
            if (outcome.immediate) {
              immediateBps += outcome.deltaBps;
            }
            state = outcome.state;

            expect(state.appliedChangeBpsInPeriod).toBe(immediateBps);
            expect(state.appliedChangeBpsInPeriod <= maxBps).toBe(true);
          }
        },
      ),
    );
  });

  it("starts a gradual transition from the current price", () => {
    const state = transition(100n, 200n, 1_000n, 100n);
    const outcome = applyPriceUpdate(state, 300n, T0 + 50n);

    expect(outcome.immediate).toBe(false);
    expect(outcome.state.transitionStartPrice).toBe(105n);
    expect(outcome.state.targetPrice).toBe(300n);
    expect(outcome.state.lastUpdateAt).toBe(T0 + 50n);
  });
});

describe("completeTransition", () => {
  it("collapses onto the target", () => {
    const done = completeTransition(transition(100n, 200n, 10n, 100n), T0 + 1n);
    expect(done.transitionStartPrice).toBe(200n);
    expect(priceAt(done, T0 + 1n)).toBe(200n);
  });
});
