/**
 * Token pricing and currency formatting.
 * Prices are quoted in USD per 1000 tokens.
 */

/**
 * Tokens covered by one quoted price unit.
 */
export const TOKENS_PER_PRICE_UNIT = 1000;

const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true,
});

/**
 * Calculate cost for a given token count.
 *
 * @param tokens - Number of tokens billed
 * @param pricePer1000 - USD per 1000 tokens
 * @returns Cost in USD
 */
export function calculateTokenCost(
  tokens: number,
  pricePer1000: number,
): number {
  return (tokens / TOKENS_PER_PRICE_UNIT) * pricePer1000;
}

/**
 * Format cost for display.
 *
 * @param costUsd - Cost in USD
 * @returns Formatted string
 */
export function formatCost(costUsd: number): string {
  if (costUsd > 0 && costUsd < 0.01) {
    return `$${costUsd.toFixed(4)}`;
  }
  return `$${costUsd.toFixed(2)}`;
}

/**
 * Format an amount with comma thousands separators and two decimals,
 * without a currency symbol (e.g. 27000 -> "27,000.00").
 *
 * @param amount - Amount in USD
 * @returns Formatted amount
 */
export function formatCurrency(amount: number): string {
  // Negative zero would print as "-0.00"
  return CURRENCY_FORMAT.format(amount === 0 ? 0 : amount);
}
