import { formatUnits, parseUnits } from 'viem';

export const PRICE_DECIMALS = 18;

/** Human-readable price string for an 18-decimal price. */
export function formatPrice(price: bigint, maxFractionDigits = 6): string {
  return trimFraction(formatUnits(price, PRICE_DECIMALS), maxFractionDigits);
}

export function formatAmount(amount: bigint, decimals: number, maxFractionDigits = 6): string {
  return trimFraction(formatUnits(amount, decimals), maxFractionDigits);
}

export function parsePrice(value: string): bigint {
  return parseUnits(value.trim(), PRICE_DECIMALS);
}

export function parseAmount(value: string, decimals: number): bigint {
  return parseUnits(value.trim(), decimals);
}

/** Truncates (never rounds) the fractional part of a decimal string. */
function trimFraction(value: string, maxFractionDigits: number): string {
  const [whole, fraction] = value.split('.');
  if (fraction === undefined || maxFractionDigits <= 0) {
    return whole;
  }
  const kept = fraction.slice(0, maxFractionDigits).replace(/0+$/, '');
  return kept.length > 0 ? `${whole}.${kept}` : whole;
}
