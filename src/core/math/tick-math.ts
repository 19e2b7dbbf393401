import { MAX_UINT256, Q192, mulDiv } from './full-math';
import { WAD } from './fixed-point';

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/** getSqrtRatioAtTick(MIN_TICK) */
export const MIN_SQRT_RATIO = 4295128739n;
/** getSqrtRatioAtTick(MAX_TICK) */
export const MAX_SQRT_RATIO = 1461446703485210103287273052203988822378723970342n;

// 1 / sqrt(1.0001)^(2^k) in Q128.128, for k = 1..19. Bit 0 seeds the ratio.
const TICK_BIT_MULTIPLIERS: ReadonlyArray<readonly [number, bigint]> = [
  [0x2, 0xfff97272373d413259a46990580e213an],
  [0x4, 0xfff2e50f5f656932ef12357cf3c7fdccn],
  [0x8, 0xffe5caca7e10e4e61c3624eaa0941cd0n],
  [0x10, 0xffcb9843d60f6159c9db58835c926644n],
  [0x20, 0xff973b41fa98c081472e6896dfb254c0n],
  [0x40, 0xff2ea16466c96a3843ec78b326b52861n],
  [0x80, 0xfe5dee046a99a2a811c461f1969c3053n],
  [0x100, 0xfcbe86c7900a88aedcffc83b479aa3a4n],
  [0x200, 0xf987a7253ac413176f2b074cf7815e54n],
  [0x400, 0xf3392b0822b70005940c7a398e4b70f3n],
  [0x800, 0xe7159475a2c29b7443b29c7fa6e889d9n],
  [0x1000, 0xd097f3bdfd2022b8845ad8f792aa5825n],
  [0x2000, 0xa9f746462d870fdf8a65dc1f90e061e5n],
  [0x4000, 0x70d869a156d2a1b890bb3df62baf32f7n],
  [0x8000, 0x31be135f97d08fd981231505542fcfa6n],
  [0x10000, 0x9aa508b5b7a84e1c677de54f3e99bc9n],
  [0x20000, 0x5d6af8dedb81196699c329225ee604n],
  [0x40000, 0x2216e584f5fa1ea926041bedfe98n],
  [0x80000, 0x48a170391f7dc42444e8fa2n],
];

/**
 * sqrt(1.0001^tick) as a Q64.96 value, rounded up.
 */
export function getSqrtRatioAtTick(tick: number): bigint {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new RangeError(`Tick ${tick} is outside [${MIN_TICK}, ${MAX_TICK}]`);
  }

  const absTick = Math.abs(tick);
  let ratio =
    (absTick & 0x1) !== 0
      ? 0xfffcb933bd6fad37aa2d162d1a594001n
      : 0x100000000000000000000000000000000n;

  for (const [mask, multiplier] of TICK_BIT_MULTIPLIERS) {
    if ((absTick & mask) !== 0) {
      ratio = (ratio * multiplier) >> 128n;
    }
  }

  if (tick > 0) {
    ratio = MAX_UINT256 / ratio;
  }

  // Q128.128 -> Q64.96, rounding up so that getTickAtSqrtRatio stays consistent
  return (ratio >> 32n) + (ratio % (1n << 32n) === 0n ? 0n : 1n);
}

/**
 * Greatest tick whose sqrt ratio is <= sqrtPriceX96.
 */
export function getTickAtSqrtRatio(sqrtPriceX96: bigint): number {
  if (sqrtPriceX96 < MIN_SQRT_RATIO || sqrtPriceX96 >= MAX_SQRT_RATIO) {
    throw new RangeError(`sqrtPriceX96 ${sqrtPriceX96} is outside the supported range`);
  }

  let lo = MIN_TICK;
  let hi = MAX_TICK;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    if (getSqrtRatioAtTick(mid) <= sqrtPriceX96) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

/**
 * How a human-readable price maps onto the pool's token0/token1 ordering.
 * Prices are quoted as whole quote tokens per whole base token, 18 decimals.
 */
export interface PairOrientation {
  baseDecimals: number;
  quoteDecimals: number;
  baseIsToken0: boolean;
}

export function sqrtRatioToPrice(sqrtPriceX96: bigint, orientation: PairOrientation): bigint {
  const ratioX192 = sqrtPriceX96 * sqrtPriceX96;
  const baseScale = WAD * 10n ** BigInt(orientation.baseDecimals);
  const quoteScale = 10n ** BigInt(orientation.quoteDecimals);

  if (orientation.baseIsToken0) {
    // raw token1 per raw token0 = ratio / 2^192
    return mulDiv(ratioX192, baseScale, Q192 * quoteScale);
  }
  return mulDiv(Q192, baseScale, ratioX192 * quoteScale);
}

export function tickToPrice(tick: number, orientation: PairOrientation): bigint {
  return sqrtRatioToPrice(getSqrtRatioAtTick(tick), orientation);
}

/**
 * The tick whose price is the greatest one not above `price`. Prices outside
 * the representable range clamp to the nearest bound.
 */
export function priceToTick(price: bigint, orientation: PairOrientation): number {
  // price rises with the tick when the base is token0 and falls otherwise
  const rising = orientation.baseIsToken0;
  const fits = (tick: number): boolean => tickToPrice(tick, orientation) <= price;

  if (rising) {
    if (!fits(MIN_TICK)) return MIN_TICK;
    let lo = MIN_TICK;
    let hi = MAX_TICK;
    while (lo < hi) {
      const mid = Math.floor((lo + hi + 1) / 2);
      if (fits(mid)) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  if (!fits(MAX_TICK)) return MAX_TICK;
  let lo = MIN_TICK;
  let hi = MAX_TICK;
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (fits(mid)) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}
