import { isAddressEqual, type Address } from 'viem';
import { LiquidityPool, PriceSource } from '../../types';
import { OracleUnavailableError, errorMessage } from '../errors';
import { floorDiv } from '../math/full-math';
import { MAX_TICK, MIN_TICK, PairOrientation, tickToPrice } from '../math/tick-math';
import { createLogger } from '../../utils';

export const DEFAULT_TWAP_WINDOW_SECONDS = 300;

export interface TwapOracleOptions {
  baseToken: Address;
  quoteToken: Address;
  defaultWindowSeconds?: number;
}

/**
 * Time-weighted average price read from a pool's tick cumulatives.
 *
 * Averaging the tick over a window means a single manipulated block moves the
 * result by at most its share of the window.
 */
export class TwapOracle implements PriceSource {
  readonly orientation: PairOrientation;
  readonly defaultWindowSeconds: number;
  private logger = createLogger('twap-oracle');

  constructor(
    private readonly pool: LiquidityPool,
    options: TwapOracleOptions
  ) {
    const baseIsToken0 = isAddressEqual(pool.token0, options.baseToken);
    const baseIsToken1 = isAddressEqual(pool.token1, options.baseToken);
    const quoteInPool = baseIsToken0
      ? isAddressEqual(pool.token1, options.quoteToken)
      : isAddressEqual(pool.token0, options.quoteToken);

    if (!(baseIsToken0 || baseIsToken1) || !quoteInPool) {
      throw new Error(
        `Pool ${pool.token0}/${pool.token1} does not trade ${options.baseToken}/${options.quoteToken}`
      );
    }

    this.orientation = {
      baseIsToken0,
      baseDecimals: pool.decimals(options.baseToken),
      quoteDecimals: pool.decimals(options.quoteToken),
    };
    this.defaultWindowSeconds = options.defaultWindowSeconds ?? DEFAULT_TWAP_WINDOW_SECONDS;
  }

  /**
   * Arithmetic mean tick over the window, rounded toward negative infinity.
   */
  async computeAverageTick(windowSeconds: number = this.defaultWindowSeconds): Promise<number> {
    if (!Number.isInteger(windowSeconds) || windowSeconds <= 0) {
      throw new OracleUnavailableError(
        `TWAP window must be a positive whole number of seconds, got ${windowSeconds}`
      );
    }

    let cumulatives: bigint[];
    try {
      cumulatives = await this.pool.observe([windowSeconds, 0]);
    } catch (error) {
      this.logger.warn('Pool observation read failed', {
        windowSeconds,
        error: errorMessage(error),
      });
      throw new OracleUnavailableError(
        `Pool cannot serve a ${windowSeconds}s TWAP window: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (cumulatives.length !== 2) {
      throw new OracleUnavailableError(
        `Expected 2 tick cumulatives from the pool, got ${cumulatives.length}`
      );
    }

    const [pastCumulative, currentCumulative] = cumulatives;
    const averageTick = floorDiv(currentCumulative - pastCumulative, BigInt(windowSeconds));

    if (averageTick < BigInt(MIN_TICK) || averageTick > BigInt(MAX_TICK)) {
      throw new OracleUnavailableError(`Average tick ${averageTick} is out of range`);
    }

    return Number(averageTick);
  }

  /**
   * Whole quote tokens per whole base token, 18 decimals.
   */
  async computeTwapPrice(windowSeconds: number = this.defaultWindowSeconds): Promise<bigint> {
    const averageTick = await this.computeAverageTick(windowSeconds);
    const price = tickToPrice(averageTick, this.orientation);

    this.logger.debug('TWAP computed', { windowSeconds, averageTick, price });
    return price;
  }
}
