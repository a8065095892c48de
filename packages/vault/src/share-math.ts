/**
 * Share math.
 *
 * Proportional accounting with a virtual offset of one share and one
 * asset unit, so the first depositor cannot inflate the share price
 * against later ones and an empty vault converts 1:1.
 */

export type Rounding = "down" | "up";

export function mulDiv(x: bigint, y: bigint, denominator: bigint, rounding: Rounding): bigint {
  const product = x * y;
  const quotient = product / denominator;
  if (rounding === "up" && quotient * denominator !== product) {
    return quotient + 1n;
  }
  return quotient;
}

export function convertToShares(
  assets: bigint,
  totalSupply: bigint,
  totalAssets: bigint,
  rounding: Rounding,
): bigint {
  return mulDiv(assets, totalSupply + 1n, totalAssets + 1n, rounding);
}

export function convertToAssets(
  shares: bigint,
  totalSupply: bigint,
  totalAssets: bigint,
  rounding: Rounding,
): bigint {
  return mulDiv(shares, totalAssets + 1n, totalSupply + 1n, rounding);
}

/**
 * Split `totalShares` across deposits in proportion to their assets.
 * Each share count is floored; the remainder is never minted.
 */
export function apportion(assets: readonly bigint[], totalShares: bigint): bigint[] {
  const totalAssets = assets.reduce((sum, amount) => sum + amount, 0n);
  if (totalAssets === 0n) {
    return assets.map(() => 0n);
  }
  return assets.map((amount) => (amount * totalShares) / totalAssets);
}
