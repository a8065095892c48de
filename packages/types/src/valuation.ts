/**
 * Valuation Types
 *
 * A vault does not hold its assets' value in custody; it is told what its
 * shares are worth by a valuation source.
 */

import type { Hex } from "./address.js";

/**
 * Feeds a vault's total-assets computation.
 */
export interface ValuationSource {
  /**
   * Total assets backing `totalSupply` shares, in asset base units.
   */
  totalAssets(totalSupply: bigint): bigint;
}

/**
 * A price reporter publishes its latest value as ABI-encoded bytes.
 * The payload decodes as a single `uint256`.
 */
export interface PriceReporter {
  report(): Hex;
}
