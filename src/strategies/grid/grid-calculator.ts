import { GridConfig, GridLevel, LevelSide } from '../../types';
import { PRECISE_UNIT, divFixed, nthRootFixed, powFixed } from '../../core/math/fixed-point';

/**
 * Geometric price ladder and its initial buy/sell split.
 *
 * Level i sits at lower * (upper / lower)^(i / (n - 1)). The step ratio is an
 * exact integer n-th root at 36 decimals, each power is taken by squaring, and
 * results are floored to 18 decimals, so interior prices are within one unit of
 * the last digit of the exact value. Both ends are pinned exactly.
 */
export class GridCalculator {
  calculateLevelPrices(lowerPrice: bigint, upperPrice: bigint, levelCount: number): bigint[] {
    if (lowerPrice <= 0n || upperPrice <= lowerPrice) {
      throw new RangeError('Price range must satisfy 0 < lower < upper');
    }
    if (!Number.isInteger(levelCount) || levelCount < 2) {
      throw new RangeError(`Level count must be an integer >= 2, got ${levelCount}`);
    }

    const steps = levelCount - 1;
    const rangeRatio = divFixed(upperPrice, lowerPrice, PRECISE_UNIT);
    const stepRatio = nthRootFixed(rangeRatio, steps, PRECISE_UNIT);

    const prices: bigint[] = [];
    for (let i = 0; i < levelCount; i++) {
      if (i === 0) {
        prices.push(lowerPrice);
      } else if (i === steps) {
        prices.push(upperPrice);
      } else {
        prices.push((lowerPrice * powFixed(stepRatio, i, PRECISE_UNIT)) / PRECISE_UNIT);
      }
    }
    return prices;
  }

  /** Levels below the reference price buy, the rest sell. */
  classifyLevel(price: bigint, referencePrice: bigint): LevelSide {
    return price < referencePrice ? 'buy' : 'sell';
  }

  buildLevels(config: Pick<GridConfig, 'lowerPrice' | 'upperPrice' | 'levelCount'>, referencePrice: bigint): GridLevel[] {
    return this.calculateLevelPrices(config.lowerPrice, config.upperPrice, config.levelCount).map(
      (price, index) => ({
        index,
        price,
        side: this.classifyLevel(price, referencePrice),
        active: true,
        lastExecutedAt: null,
        executionCount: 0,
      })
    );
  }

  isStrictlyAscending(prices: readonly bigint[]): boolean {
    return prices.every((price, i) => i === 0 || price > prices[i - 1]);
  }
}
