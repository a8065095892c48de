/**
 * Valuation sources.
 *
 * - CustodyValuation: total assets are whatever the custody account holds
 * - ReportedValuation: total assets are the supply priced by a reporter
 */

import { decodeAbiParameters } from "viem";
import type { Address, PriceReporter, ValuationSource } from "@shareport/types";
import type { AssetToken } from "@shareport/runtime";

export class CustodyValuation implements ValuationSource {
  constructor(
    private readonly asset: AssetToken,
    private readonly custody: Address,
  ) {}

  totalAssets(_totalSupply: bigint): bigint {
    return this.asset.balanceOf(this.custody);
  }
}

/**
 * Values shares by a reported price per share, scaled by `scale`
 * (1e18 = one asset unit per share unit).
 */
export class ReportedValuation implements ValuationSource {
  constructor(
    private readonly reporter: PriceReporter,
    private readonly scale: bigint = 10n ** 18n,
  ) {}

  pricePerShare(): bigint {
    const [price] = decodeAbiParameters([{ type: "uint256" }], this.reporter.report());
    return price;
  }

  totalAssets(totalSupply: bigint): bigint {
    return (this.pricePerShare() * totalSupply) / this.scale;
  }
}
