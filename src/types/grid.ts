import type { Address } from 'viem';

export type LevelSide = 'buy' | 'sell';

/** Which of the two custodied assets an operation touches. */
export type TokenSlot = 'A' | 'B';

/** Pool fee in hundredths of a basis point. */
export type FeeTier = 100 | 500 | 3000 | 10000;

/**
 * Grid parameters. Prices are whole tokenB per whole tokenA with 18 decimals;
 * order sizes are raw token units.
 */
export interface GridConfig {
  tokenA: Address;
  tokenB: Address;
  lowerPrice: bigint;
  upperPrice: bigint;
  levelCount: number;
  /** tokenA sold by a sell level */
  orderSizeA: bigint;
  /** tokenB spent by a buy level */
  orderSizeB: bigint;
  feeTier: FeeTier;
  maxSlippageBps: number;
}

export interface GridLevel {
  index: number;
  price: bigint;
  side: LevelSide;
  active: boolean;
  /** unix seconds; null when the level has not executed since its last cooldown reset */
  lastExecutedAt: number | null;
  executionCount: number;
}

export interface Balances {
  balanceA: bigint;
  balanceB: bigint;
}
