/**
 * Integer fixed-point helpers. Values are bigints scaled by a power-of-ten unit;
 * every operation rounds down, so results are monotone in their inputs.
 */

export const WAD = 10n ** 18n;

/** Working precision used for ratios that are raised to a power. */
export const PRECISE_UNIT = 10n ** 36n;

export const BPS_DENOMINATOR = 10_000n;

export function mulFixed(a: bigint, b: bigint, unit: bigint): bigint {
  return (a * b) / unit;
}

export function divFixed(a: bigint, b: bigint, unit: bigint): bigint {
  if (b === 0n) {
    throw new RangeError('divFixed: division by zero');
  }
  return (a * unit) / b;
}

/**
 * base^exponent by squaring, both base and result scaled by `unit`.
 */
export function powFixed(base: bigint, exponent: number, unit: bigint): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new RangeError(`powFixed: exponent must be a non-negative integer, got ${exponent}`);
  }

  let result = unit;
  let factor = base;
  let remaining = exponent;

  while (remaining > 0) {
    if (remaining & 1) {
      result = mulFixed(result, factor, unit);
    }
    remaining >>= 1;
    if (remaining > 0) {
      factor = mulFixed(factor, factor, unit);
    }
  }

  return result;
}

/**
 * Greatest y such that powFixed(y, n, unit) <= x.
 *
 * Bisection over the integers keeps the result exact to one unit of the last
 * digit without touching floating point.
 */
export function nthRootFixed(x: bigint, n: number, unit: bigint): bigint {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`nthRootFixed: degree must be a positive integer, got ${n}`);
  }
  if (x < 0n) {
    throw new RangeError('nthRootFixed: negative radicand');
  }
  if (n === 1 || x === 0n) {
    return x;
  }

  let lo = x >= unit ? unit : 0n;
  let hi = x >= unit ? x : unit;

  while (lo < hi) {
    const mid = (lo + hi + 1n) / 2n;
    if (powFixed(mid, n, unit) <= x) {
      lo = mid;
    } else {
      hi = mid - 1n;
    }
  }

  return lo;
}

/**
 * amount * (10000 - bps) / 10000
 */
export function applyBpsDiscount(amount: bigint, bps: number): bigint {
  return (amount * (BPS_DENOMINATOR - BigInt(bps))) / BPS_DENOMINATOR;
}
