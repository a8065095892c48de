/**
 * A vault valued by the price transition oracle.
 */

import { describe, it, expect } from "vitest";
import { PriceTransitionOracle } from "@shareport/oracle";
import { ShareVault } from "../src/share-vault.js";
import { ReportedValuation } from "../src/valuation.js";
import { ADMIN, ALICE, VAULT, createFixture, fund } from "./helpers.js";

const ORACLE = "0x0000000000000000000000000000000000000020";

describe("ShareVault with ReportedValuation", () => {
  it("follows the oracle's price per share", () => {
    const f = createFixture();
    const oracle = new PriceTransitionOracle(f.env, {
      address: ORACLE,
      owner: ADMIN,
      initialPrice: 10n ** 18n,
      maxDeviationBps: 1_000n,
      periodSeconds: 60n,
    });
    f.relay.recognize(VAULT, [VAULT]);
    const vault = new ShareVault(f.env, {
      address: VAULT,
      name: "Reported Shares",
      symbol: "rUSDX",
      asset: f.asset,
      relay: f.relay,
      authorization: f.roles,
      valuation: new ReportedValuation(oracle),
    });
    fund(f, ALICE, 1_000n);

    expect(vault.deposit(ALICE, 1_000n, ALICE)).toBe(1_000n);
    expect(vault.totalAssets()).toBe(1_000n);

    oracle.update(ADMIN, 1_100_000_000_000_000_000n, "appraisal");

    expect(vault.totalAssets()).toBe(1_100n);
    expect(vault.convertToAssets(1_000n)).toBe(1_099n);
    expect(vault.previewDeposit(1_100n)).toBe(1_000n);
  });
});
