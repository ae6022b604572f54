import type { Holding } from "../domain/types";

/**
 * Day-over-day price change in percent, or undefined without a usable
 * previous price.
 */
export function priceVariationPercent(holding: Holding): number | undefined {
  const previous = holding.previousPrice;
  if (previous === undefined || previous <= 0) return undefined;
  return ((holding.price - previous) / previous) * 100;
}

/**
 * Keeps holdings whose absolute price variation is at least `minPercent`.
 * Holdings without a previous price are dropped.
 */
export function filterByPriceVariation(
  holdings: readonly Holding[],
  minPercent: number
): Holding[] {
  return holdings.filter((holding) => {
    const variation = priceVariationPercent(holding);
    return variation !== undefined && Math.abs(variation) >= minPercent;
  });
}
