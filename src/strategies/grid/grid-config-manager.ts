import { isAddress, isAddressEqual } from 'viem';
import { FeeTier, GridConfig } from '../../types';
import { GridBotError, InvalidConfigError } from '../../core/errors';
import { GridCalculator } from './grid-calculator';

export const MIN_LEVEL_COUNT = 2;
export const MAX_LEVEL_COUNT = 100;
export const MAX_SLIPPAGE_BPS = 1000;
export const SUPPORTED_FEE_TIERS: readonly FeeTier[] = [100, 500, 3000, 10000];

/** The pair and fee of the pool a configuration must trade on. */
export interface PoolPair {
  token0: string;
  token1: string;
  fee: number;
}

const calculator = new GridCalculator();

/**
 * Throws InvalidConfigError naming the first field that violates an invariant.
 */
export function validateGridConfig(config: GridConfig, pool?: PoolPair): void {
  if (!isAddress(config.tokenA)) {
    throw new InvalidConfigError('tokenA', `${config.tokenA} is not a valid address`);
  }
  if (!isAddress(config.tokenB)) {
    throw new InvalidConfigError('tokenB', `${config.tokenB} is not a valid address`);
  }
  if (isAddressEqual(config.tokenA, config.tokenB)) {
    throw new InvalidConfigError('tokenB', 'must differ from tokenA');
  }
  if (pool && !tradesPair(pool, config.tokenA, config.tokenB)) {
    throw new InvalidConfigError(
      'tokenA',
      `pool ${pool.token0}/${pool.token1} does not trade ${config.tokenA}/${config.tokenB}`
    );
  }

  if (config.lowerPrice <= 0n) {
    throw new InvalidConfigError('lowerPrice', 'must be greater than zero');
  }
  if (config.upperPrice <= config.lowerPrice) {
    throw new InvalidConfigError('upperPrice', 'must be greater than lowerPrice');
  }

  if (
    !Number.isInteger(config.levelCount) ||
    config.levelCount < MIN_LEVEL_COUNT ||
    config.levelCount > MAX_LEVEL_COUNT
  ) {
    throw new InvalidConfigError(
      'levelCount',
      `must be an integer between ${MIN_LEVEL_COUNT} and ${MAX_LEVEL_COUNT}, got ${config.levelCount}`
    );
  }

  if (config.orderSizeA <= 0n) {
    throw new InvalidConfigError('orderSizeA', 'must be greater than zero');
  }
  if (config.orderSizeB <= 0n) {
    throw new InvalidConfigError('orderSizeB', 'must be greater than zero');
  }

  if (!SUPPORTED_FEE_TIERS.some(tier => tier === config.feeTier)) {
    throw new InvalidConfigError(
      'feeTier',
      `${config.feeTier} is not one of ${SUPPORTED_FEE_TIERS.join(', ')}`
    );
  }
  if (pool && pool.fee !== config.feeTier) {
    throw new InvalidConfigError('feeTier', `pool fee is ${pool.fee}, config asks for ${config.feeTier}`);
  }

  if (
    !Number.isInteger(config.maxSlippageBps) ||
    config.maxSlippageBps < 0 ||
    config.maxSlippageBps > MAX_SLIPPAGE_BPS
  ) {
    throw new InvalidConfigError(
      'maxSlippageBps',
      `must be an integer between 0 and ${MAX_SLIPPAGE_BPS}, got ${config.maxSlippageBps}`
    );
  }

  const prices = calculator.calculateLevelPrices(config.lowerPrice, config.upperPrice, config.levelCount);
  if (!calculator.isStrictlyAscending(prices)) {
    throw new InvalidConfigError(
      'upperPrice',
      `range ${config.lowerPrice}-${config.upperPrice} is too narrow for ${config.levelCount} distinct levels`
    );
  }
}

function tradesPair(pool: PoolPair, tokenA: string, tokenB: string): boolean {
  const same = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();
  return (
    (same(pool.token0, tokenA) && same(pool.token1, tokenB)) ||
    (same(pool.token0, tokenB) && same(pool.token1, tokenA))
  );
}

/**
 * Holds the grid configuration. The first accepted configuration wins; the only
 * way to replace it is an explicit reset.
 */
export class GridConfigManager {
  private config?: Readonly<GridConfig>;

  constructor(private readonly pool?: PoolPair) {}

  /** Checks a candidate against the current state without storing it. */
  prepare(config: GridConfig): Readonly<GridConfig> {
    if (this.config) {
      throw new GridBotError('ALREADY_CONFIGURED', 'Grid is already configured; reset it first');
    }
    validateGridConfig(config, this.pool);
    return Object.freeze({ ...config });
  }

  configure(config: GridConfig): Readonly<GridConfig> {
    this.config = this.prepare(config);
    return this.config;
  }

  isConfigured(): boolean {
    return this.config !== undefined;
  }

  get(): Readonly<GridConfig> | undefined {
    return this.config;
  }

  require(): Readonly<GridConfig> {
    if (!this.config) {
      throw new GridBotError('NOT_CONFIGURED', 'Grid is not configured');
    }
    return this.config;
  }

  reset(): void {
    this.config = undefined;
  }
}
