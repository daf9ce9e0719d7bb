/**
 * USD conversions between the HTTP surface (decimal dollars) and the
 * ledger (integer cents).
 */

const USD_PATTERN = /^\d+(\.\d{1,2})?$/;

/**
 * Parse a dollar amount with at most two decimals into cents.
 * Returns null for negative, non-finite or over-precise values.
 */
export const usdToCents = (usd: number | string): number | null => {
  const text = typeof usd === 'number' ? String(usd) : usd.trim();
  if (!USD_PATTERN.test(text)) {
    return null;
  }

  const [whole, fraction = ''] = text.split('.');
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return Number.isSafeInteger(cents) ? cents : null;
};

/**
 * Signed variant used by admin adjustments
 */
export const signedUsdToCents = (usd: number | string): number | null => {
  const text = typeof usd === 'number' ? String(usd) : usd.trim();
  if (text.startsWith('-')) {
    const cents = usdToCents(text.slice(1));
    return cents === null ? null : -cents;
  }
  return usdToCents(text);
};

export const centsToUsd = (cents: number): number => Math.round(cents) / 100;

export const formatUsd = (cents: number): string => {
  const sign = cents < 0 ? '-' : '';
  return `${sign}$${(Math.abs(cents) / 100).toFixed(2)}`;
};

/**
 * Convert a raw on-chain token amount to whole cents, flooring any
 * sub-cent remainder.
 */
export const rawAmountToCents = (raw: string, decimals: number): number => {
  const value = BigInt(raw);
  if (decimals >= 2) {
    return Number(value / 10n ** BigInt(decimals - 2));
  }
  return Number(value * 10n ** BigInt(2 - decimals));
};
