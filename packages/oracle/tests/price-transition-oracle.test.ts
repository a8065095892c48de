/**
 * Tests for PriceTransitionOracle — immediate and gradual updates, policy,
 * updaters, reporting.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { decodeAbiParameters } from "viem";
import { Environment } from "@shareport/runtime";
import { PriceTransitionOracle } from "../src/price-transition-oracle.js";
import { OracleError } from "../src/errors.js";

const ORACLE = "0x0000000000000000000000000000000000000020";
const OWNER = "0x0000000000000000000000000000000000000001";
const FEED = "0x0000000000000000000000000000000000000002";
const STRANGER = "0x0000000000000000000000000000000000000003";

const ONE = 10n ** 18n;

describe("PriceTransitionOracle", () => {
  let env: Environment;
  let oracle: PriceTransitionOracle;

  beforeEach(() => {
    env = new Environment({ chainId: 1 });
    oracle = new PriceTransitionOracle(env, {
      address: ORACLE,
      owner: OWNER,
      initialPrice: ONE,
      maxDeviationBps: 1_000n,
      periodSeconds: 60n,
    });
  });

  describe("construction", () => {
    it("starts idle at the initial price", () => {
      expect(oracle.getCurrentPrice()).toBe(ONE);
      expect(oracle.getTransitionProgress()).toBe(10_000n);
      expect(oracle.getState().round).toBe(0);
    });

    it("rejects a zero initial price", () => {
      expect(
        () =>
          new PriceTransitionOracle(env, {
            address: ORACLE,
            owner: OWNER,
            initialPrice: 0n,
            maxDeviationBps: 1_000n,
            periodSeconds: 60n,
          }),
      ).toThrow(OracleError);
    });

    it("rejects a zero policy", () => {
      expect(
        () =>
          new PriceTransitionOracle(env, {
            address: ORACLE,
            owner: OWNER,
            initialPrice: ONE,
            maxDeviationBps: 1_000n,
            periodSeconds: 0n,
          }),
      ).toThrow("Period must be positive, got 0s");
    });
  });

  describe("update", () => {
    it("applies a move within budget at once, then transitions gradually", () => {
      oracle.update(OWNER, 1_100_000_000_000_000_000n, "nav");
      expect(oracle.getCurrentPrice()).toBe(1_100_000_000_000_000_000n);

      oracle.update(OWNER, 1_210_000_000_000_000_000n, "nav");
      expect(oracle.getCurrentPrice()).toBe(1_100_000_000_000_000_000n);
      expect(oracle.getTransitionProgress()).toBe(0n);

      env.advanceTime(30n);
      expect(oracle.getCurrentPrice()).toBe(1_155_000_000_000_000_000n);
      expect(oracle.getTransitionProgress()).toBe(5_000n);

      env.advanceTime(30n);
      expect(oracle.getCurrentPrice()).toBe(1_210_000_000_000_000_000n);
      expect(oracle.getTransitionProgress()).toBe(10_000n);

      env.advanceTime(600n);
      expect(oracle.getCurrentPrice()).toBe(1_210_000_000_000_000_000n);
      expect(oracle.getState().round).toBe(2);
    });

    it("moves downwards towards a lower target", () => {
      oracle.update(OWNER, ONE / 2n, "nav");
      expect(oracle.getCurrentPrice()).toBe(ONE);

      env.advanceTime(60n);
      expect(oracle.getCurrentPrice()).toBe(900_000_000_000_000_000n);

      env.advanceTime(240n);
      expect(oracle.getCurrentPrice()).toBe(ONE / 2n);
    });

    it("spends the period budget across small updates", () => {
      const prices = [102n, 104n, 106n, 108n, 110n, 112n].map((p) => (p * ONE) / 100n);
      for (const price of prices) {
        oracle.update(OWNER, price, "feed");
      }

      const state = oracle.getState();
      expect(oracle.getCurrentPrice()).toBe(1_100_000_000_000_000_000n);
      expect(state.appliedChangeBpsInPeriod).toBe(961n);
      expect(state.targetPrice).toBe(1_120_000_000_000_000_000n);
      expect(state.transitionStartPrice).toBe(1_100_000_000_000_000_000n);
    });

    it("resets the budget once a full period passes without updates", () => {
      oracle.update(OWNER, 1_100_000_000_000_000_000n, "nav");
      env.advanceTime(60n);
      oracle.update(OWNER, 1_210_000_000_000_000_000n, "nav");

      expect(oracle.getCurrentPrice()).toBe(1_210_000_000_000_000_000n);
      expect(oracle.getState().appliedChangeBpsInPeriod).toBe(1_000n);
    });

    it("rejects callers that are not updaters", () => {
      expect(() => oracle.update(STRANGER, ONE, "nav")).toThrow(
        `${STRANGER} is not an authorized price updater`,
      );
    });

    it("rejects an empty source", () => {
      expect(() => oracle.update(OWNER, ONE, "  ")).toThrow(OracleError);
    });

    it("rejects a zero price and leaves state untouched", () => {
      const before = oracle.getState();
      expect(() => oracle.update(OWNER, 0n, "nav")).toThrow("Price must be positive, got 0");
      expect(oracle.getState()).toEqual(before);
    });

    it("emits price updates", () => {
      oracle.update(OWNER, 1_210_000_000_000_000_000n, "appraisal");
      const [stored] = env.events.read(`oracle:${ORACLE}`);
      expect(stored?.event.type).toBe("oracle.price.updated");
      expect(stored?.event.payload).toEqual({
        round: 1,
        targetPrice: "1210000000000000000",
        transitionStartPrice: "1000000000000000000",
        source: "appraisal",
        immediate: false,
      });
    });
  });

  describe("setMaxDeviation", () => {
    it("rebases a running transition on the current price", () => {
      oracle.update(OWNER, 1_100_000_000_000_000_000n, "nav");
      oracle.update(OWNER, 1_210_000_000_000_000_000n, "nav");
      env.advanceTime(30n);

      oracle.setMaxDeviation(OWNER, 500n, 60n);
      expect(oracle.getCurrentPrice()).toBe(1_155_000_000_000_000_000n);
      expect(oracle.getState().appliedChangeBpsInPeriod).toBe(0n);

      env.advanceTime(30n);
      expect(oracle.getCurrentPrice()).toBe(1_183_875_000_000_000_000n);

      env.advanceTime(30n);
      expect(oracle.getCurrentPrice()).toBe(1_210_000_000_000_000_000n);
    });

    it("records old and new policy", () => {
      oracle.setMaxDeviation(OWNER, 250n, 3_600n);
      const [stored] = env.events.read(`oracle:${ORACLE}`);
      expect(stored?.event.payload).toEqual({
        oldMaxDeviationBps: "1000",
        newMaxDeviationBps: "250",
        oldPeriodSeconds: "60",
        newPeriodSeconds: "3600",
      });
    });

    it("is owner-only and rejects zeros", () => {
      expect(() => oracle.setMaxDeviation(FEED, 500n, 60n)).toThrow(OracleError);
      expect(() => oracle.setMaxDeviation(OWNER, 0n, 60n)).toThrow(
        "Max deviation must be positive, got 0 bps",
      );
      expect(oracle.getState().maxDeviationBpsPerPeriod).toBe(1_000n);
    });
  });

  describe("forceCompleteTransition", () => {
    it("jumps to the target", () => {
      oracle.update(OWNER, 2n * ONE, "nav");
      oracle.forceCompleteTransition(OWNER);

      expect(oracle.getCurrentPrice()).toBe(2n * ONE);
      expect(oracle.getTransitionProgress()).toBe(10_000n);
    });

    it("is owner-only", () => {
      expect(() => oracle.forceCompleteTransition(STRANGER)).toThrow(
        `${STRANGER} is not the oracle owner`,
      );
    });
  });

  describe("setUpdater", () => {
    it("grants and revokes update rights", () => {
      oracle.setUpdater(OWNER, FEED, true);
      oracle.update(FEED, 1_050_000_000_000_000_000n, "feed");
      expect(oracle.getCurrentPrice()).toBe(1_050_000_000_000_000_000n);

      oracle.setUpdater(OWNER, FEED, false);
      expect(() => oracle.update(FEED, ONE, "feed")).toThrow(OracleError);
    });

    it("keeps the owner an updater", () => {
      oracle.setUpdater(OWNER, OWNER, false);
      expect(oracle.isUpdater(OWNER)).toBe(true);
    });
  });

  describe("report", () => {
    it("encodes the current price as one uint256", () => {
      oracle.update(OWNER, 1_210_000_000_000_000_000n, "nav");
      env.advanceTime(30n);

      const [price] = decodeAbiParameters([{ type: "uint256" }], oracle.report());
      expect(price).toBe(1_050_000_000_000_000_000n);
    });
  });

  it("rolls back with the surrounding operation", () => {
    expect(() =>
      env.atomic(() => {
        oracle.update(OWNER, 1_050_000_000_000_000_000n, "nav");
        throw new Error("downstream failure");
      }),
    ).toThrow("downstream failure");

    expect(oracle.getCurrentPrice()).toBe(ONE);
    expect(env.events.read(`oracle:${ORACLE}`)).toHaveLength(0);
  });
});
