import { isAddressEqual, type Address } from 'viem';
import { Clock, LiquidityPool, SwapParams, SwapReceipt } from '../types';
import { SlippageExceededError } from '../core/errors';
import { Q192, mulDiv } from '../core/math/full-math';
import { BPS_DENOMINATOR } from '../core/math/fixed-point';
import {
  MAX_TICK,
  MIN_TICK,
  PairOrientation,
  getSqrtRatioAtTick,
  priceToTick,
} from '../core/math/tick-math';
import { FEE_DENOMINATOR } from '../core/risk-management/slippage-guard';
import { createLogger } from '../utils';

export interface SimulatedToken {
  address: Address;
  decimals: number;
}

export interface SimulatedPoolOptions {
  token0: SimulatedToken;
  token1: SimulatedToken;
  fee: number;
  clock: Clock;
  initialTick?: number;
  /** starts the pool at this price instead of `initialTick` */
  initialPrice?: { price: bigint; baseToken: Address };
  /**
   * Seconds of history the pool starts with at `initialTick`, so a TWAP can be
   * read right away.
   */
  historySeconds?: number;
}

interface Observation {
  timestamp: number;
  tickCumulative: bigint;
  /** tick in force from `timestamp` onwards */
  tick: number;
}

/**
 * In-process concentrated-liquidity pool for paper trading and tests.
 *
 * Keeps a tick-cumulative observation history like an on-chain pool and fills
 * swaps at the current tick with unlimited depth, less the fee and an optional
 * execution skew.
 */
export class SimulatedPool implements LiquidityPool {
  readonly token0: Address;
  readonly token1: Address;
  readonly fee: number;

  private readonly tokens: readonly [SimulatedToken, SimulatedToken];
  private readonly clock: Clock;
  private readonly observations: Observation[] = [];
  private executionSkewBps = 0;
  private swapCount = 0;
  private logger = createLogger('simulated-pool');

  constructor(options: SimulatedPoolOptions) {
    if (isAddressEqual(options.token0.address, options.token1.address)) {
      throw new Error('Pool tokens must differ');
    }
    if (!Number.isInteger(options.fee) || options.fee < 0 || BigInt(options.fee) >= FEE_DENOMINATOR) {
      throw new Error(`Invalid pool fee ${options.fee}`);
    }

    this.tokens = [options.token0, options.token1];
    this.token0 = options.token0.address;
    this.token1 = options.token1.address;
    this.fee = options.fee;
    this.clock = options.clock;

    const tick = options.initialPrice
      ? priceToTick(options.initialPrice.price, this.orientation(options.initialPrice.baseToken))
      : (options.initialTick ?? 0);
    SimulatedPool.checkTick(tick);
    this.observations.push({
      timestamp: this.clock.now() - (options.historySeconds ?? 0),
      tickCumulative: 0n,
      tick,
    });
  }

  decimals(token: Address): number {
    return this.token(token).decimals;
  }

  get currentTick(): number {
    return this.latest().tick;
  }

  get swapsExecuted(): number {
    return this.swapCount;
  }

  /** Moves the pool to `tick` as of now. */
  setTick(tick: number): void {
    SimulatedPool.checkTick(tick);
    const now = this.clock.now();
    const last = this.latest();
    if (now < last.timestamp) {
      throw new RangeError('Clock is behind the latest observation');
    }
    if (now === last.timestamp) {
      last.tick = tick;
      return;
    }
    this.observations.push({
      timestamp: now,
      tickCumulative: last.tickCumulative + BigInt(last.tick) * BigInt(now - last.timestamp),
      tick,
    });
  }

  /**
   * Moves the pool to the tick nearest below `price`, given as whole units of
   * the other token per whole `baseToken` with 18 decimals.
   */
  setPrice(price: bigint, baseToken: Address = this.token0): number {
    const tick = priceToTick(price, this.orientation(baseToken));
    this.setTick(tick);
    return tick;
  }

  /** Every fill is reduced by `bps` on top of the fee. */
  setExecutionSkewBps(bps: number): void {
    if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
      throw new RangeError(`Execution skew must be 0-10000 bps, got ${bps}`);
    }
    this.executionSkewBps = bps;
  }

  async observe(secondsAgos: readonly number[]): Promise<bigint[]> {
    const now = this.clock.now();
    const oldest = this.observations[0];

    return secondsAgos.map(secondsAgo => {
      const target = now - secondsAgo;
      if (target < oldest.timestamp) {
        throw new Error('OLD');
      }
      const observation = this.observationAt(target);
      return observation.tickCumulative + BigInt(observation.tick) * BigInt(target - observation.timestamp);
    });
  }

  async swapExactInput(params: SwapParams): Promise<SwapReceipt> {
    if (params.fee !== this.fee) {
      throw new Error(`Pool fee is ${this.fee}, swap asked for ${params.fee}`);
    }
    if (params.amountIn <= 0n) {
      throw new Error('Swap amount must be positive');
    }
    const zeroForOne = isAddressEqual(params.tokenIn, this.token0);
    const expectedOut = zeroForOne ? this.token1 : this.token0;
    this.token(params.tokenIn);
    if (!isAddressEqual(params.tokenOut, expectedOut)) {
      throw new Error(`Pool does not swap ${params.tokenIn} for ${params.tokenOut}`);
    }

    const sqrtPriceX96 = getSqrtRatioAtTick(this.currentTick);
    const ratioX192 = sqrtPriceX96 * sqrtPriceX96;
    const amountInLessFee = (params.amountIn * (FEE_DENOMINATOR - BigInt(this.fee))) / FEE_DENOMINATOR;

    let amountOut = zeroForOne
      ? mulDiv(amountInLessFee, ratioX192, Q192)
      : mulDiv(amountInLessFee, Q192, ratioX192);
    amountOut = (amountOut * (BPS_DENOMINATOR - BigInt(this.executionSkewBps))) / BPS_DENOMINATOR;

    if (amountOut < params.amountOutMinimum) {
      throw new SlippageExceededError(amountOut, params.amountOutMinimum);
    }

    this.swapCount += 1;
    this.logger.debug('Swap filled', {
      tokenIn: params.tokenIn,
      amountIn: params.amountIn,
      amountOut,
      tick: this.currentTick,
    });
    return { amountIn: params.amountIn, amountOut };
  }

  private orientation(baseToken: Address): PairOrientation {
    const baseIsToken0 = isAddressEqual(baseToken, this.token0);
    const [base, quote] = baseIsToken0 ? this.tokens : [this.tokens[1], this.tokens[0]];
    this.token(baseToken);
    return { baseIsToken0, baseDecimals: base.decimals, quoteDecimals: quote.decimals };
  }

  private token(address: Address): SimulatedToken {
    const match = this.tokens.find(token => isAddressEqual(token.address, address));
    if (!match) {
      throw new Error(`Token ${address} is not in this pool`);
    }
    return match;
  }

  private latest(): Observation {
    return this.observations[this.observations.length - 1];
  }

  private observationAt(timestamp: number): Observation {
    for (let i = this.observations.length - 1; i >= 0; i--) {
      if (this.observations[i].timestamp <= timestamp) {
        return this.observations[i];
      }
    }
    return this.observations[0];
  }

  private static checkTick(tick: number): void {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
      throw new RangeError(`Tick ${tick} is outside [${MIN_TICK}, ${MAX_TICK}]`);
    }
  }
}
