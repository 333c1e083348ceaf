/**
 * Fixed-point helpers for 18-decimal prices
 *
 * All arithmetic is bigint and truncates toward zero.
 */

import { formatUnits, parseUnits } from 'ethers';
import { PRICE_DECIMALS } from '../config/constants';

/**
 * 10^n as a bigint
 */
export function pow10(n: number): bigint {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Invalid power of ten: ${n}`);
  }
  return 10n ** BigInt(n);
}

/**
 * Rescale a value reported with `decimals` fractional digits to 18
 */
export function rescaleTo18(value: bigint, decimals: number): bigint {
  if (decimals <= PRICE_DECIMALS) {
    return value * pow10(PRICE_DECIMALS - decimals);
  }
  return value / pow10(decimals - PRICE_DECIMALS);
}

/**
 * Rescale a mantissa/exponent pair (value = price * 10^exponent) to 18 decimals
 */
export function scaleByExponent(price: bigint, exponent: number): bigint {
  const shift = PRICE_DECIMALS + exponent;
  if (shift >= 0) {
    return price * pow10(shift);
  }
  return price / pow10(-shift);
}

/**
 * Apply the native/asset decimal correction to an 18-decimal ratio
 */
export function applyDecimalCorrection(
  ratio18: bigint,
  nativeDecimals: number,
  assetDecimals: number
): bigint {
  const factor = pow10(Math.abs(nativeDecimals - assetDecimals));
  return nativeDecimals >= assetDecimals ? ratio18 * factor : ratio18 / factor;
}

/**
 * Relative change between two prices in basis points (absolute value)
 */
export function deviationBps(previous: bigint, next: bigint): bigint {
  if (previous === 0n) {
    return 0n;
  }
  const diff = next > previous ? next - previous : previous - next;
  return (diff * 10_000n) / previous;
}

/**
 * Human-readable price for logs
 */
export function formatPrice18(price18: bigint, maxFractionDigits: number = 6): string {
  const [whole, fraction = ''] = formatUnits(price18, PRICE_DECIMALS).split('.');
  const trimmed = fraction.slice(0, maxFractionDigits).replace(/0+$/, '');
  return trimmed.length > 0 ? `${whole}.${trimmed}` : `${whole}`;
}

/**
 * Parse a decimal string such as "0.25" into an 18-decimal price
 */
export function parsePrice18(value: string): bigint {
  return parseUnits(value.trim(), PRICE_DECIMALS);
}
