/**
 * Property-Based Tests for the deposit escrow
 *
 * For any sequence of requests, accepts, refunds, reclaims and clock
 * moves:
 * 1. totalPendingAssets == Σ userPendingAssets == Σ pending deposit
 *    amounts == escrow custody balance
 * 2. The round equals the number of successful operator calls
 * 3. No asset unit is created or lost
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address, Hex } from "@shareport/types";
import { ShareportError } from "@shareport/types";
import {
  ALICE,
  BOB,
  CAROL,
  ESCROW,
  OPERATOR,
  SEVEN_DAYS,
  VAULT,
  createFixture,
  createGatedVault,
  fund,
} from "./helpers.js";

const USERS: readonly Address[] = [ALICE, BOB, CAROL];
const FUNDING = 10_000n;

type Action =
  | { readonly kind: "request"; readonly user: number; readonly amount: bigint }
  | { readonly kind: "accept" | "refund" | "reclaim"; readonly pick: number }
  | { readonly kind: "wait"; readonly seconds: bigint };

const arbAction: fc.Arbitrary<Action> = fc.oneof(
  fc.record({
    kind: fc.constant("request" as const),
    user: fc.integer({ min: 0, max: USERS.length - 1 }),
    amount: fc.bigInt({ min: 1n, max: 2_000n }),
  }),
  fc.record({
    kind: fc.constantFrom("accept" as const, "refund" as const, "reclaim" as const),
    pick: fc.nat(),
  }),
  fc.record({
    kind: fc.constant("wait" as const),
    seconds: fc.bigInt({ min: 0n, max: 2n * SEVEN_DAYS }),
  }),
);

/** Run an action that may legitimately be refused. */
function attempt(operation: () => unknown): boolean {
  try {
    operation();
    return true;
  } catch (error) {
    if (error instanceof ShareportError) {
      return false;
    }
    throw error;
  }
}

describe("escrow conservation", () => {
  it("keeps the ledger, custody and round consistent", () => {
    fc.assert(
      fc.property(fc.array(arbAction, { minLength: 1, maxLength: 40 }), (actions) => {
        const f = createFixture();
        const vault = createGatedVault(f);
        const escrow = vault.escrow;
        for (const user of USERS) {
          fund(f, user, FUNDING);
        }

        const ids: Hex[] = [];
        let operatorCalls = 0;

        for (const action of actions) {
          switch (action.kind) {
            case "request": {
              const user = USERS[action.user] ?? ALICE;
              attempt(() => ids.push(vault.requestDeposit(user, action.amount, user)));
              break;
            }
            case "accept":
            case "refund":
            case "reclaim": {
              const id = ids[action.pick % Math.max(ids.length, 1)];
              if (id === undefined) break;
              if (action.kind === "accept" && attempt(() => escrow.acceptDeposit(OPERATOR, id))) {
                operatorCalls += 1;
              }
              if (action.kind === "refund" && attempt(() => escrow.refundDeposit(OPERATOR, id))) {
                operatorCalls += 1;
              }
              if (action.kind === "reclaim") {
                const depositor = escrow.getDeposit(id)?.depositor ?? ALICE;
                attempt(() => escrow.reclaimDeposit(depositor, id));
              }
              break;
            }
            case "wait":
              f.env.advanceTime(action.seconds);
              break;
          }

          const perUser = USERS.reduce((sum, user) => sum + escrow.userPendingAssets(user), 0n);
          const pending = USERS.flatMap((user) => escrow.getUserPendingDeposits(user)).reduce(
            (sum, d) => sum + d.assetAmount,
            0n,
          );
          expect(escrow.totalPendingAssets).toBe(perUser);
          expect(escrow.totalPendingAssets).toBe(pending);
          expect(f.asset.balanceOf(ESCROW)).toBe(pending);
          expect(escrow.currentRound).toBe(operatorCalls);

          const held = USERS.reduce((sum, user) => sum + f.asset.balanceOf(user), 0n);
          expect(held + f.asset.balanceOf(ESCROW) + f.asset.balanceOf(VAULT)).toBe(
            FUNDING * BigInt(USERS.length),
          );
        }
      }),
      { numRuns: 50 },
    );
  });
});
