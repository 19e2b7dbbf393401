import type { Address } from 'viem';

export interface SwapParams {
  tokenIn: Address;
  tokenOut: Address;
  fee: number;
  amountIn: bigint;
  amountOutMinimum: bigint;
  recipient: string;
}

export interface SwapReceipt {
  amountIn: bigint;
  amountOut: bigint;
}

/**
 * The single liquidity pool the engine trades against. Mirrors the subset of a
 * concentrated-liquidity pool and its router that the engine consumes.
 */
export interface LiquidityPool {
  readonly token0: Address;
  readonly token1: Address;
  readonly fee: number;

  decimals(token: Address): number;

  /**
   * Tick cumulatives as of each `secondsAgo`. Rejects when a requested point
   * predates the stored observation history.
   */
  observe(secondsAgos: readonly number[]): Promise<bigint[]>;

  /**
   * Exact-input swap. Rejects with SlippageExceededError when the output would
   * fall below `amountOutMinimum`.
   */
  swapExactInput(params: SwapParams): Promise<SwapReceipt>;
}

/** Anything that can produce the time-weighted price used for triggering. */
export interface PriceSource {
  computeTwapPrice(windowSeconds?: number): Promise<bigint>;
}

export interface Clock {
  /** unix seconds */
  now(): number;
}
