import {
  Clock,
  ExecutionTrigger,
  FailureReason,
  GridConfig,
  GridExecutionSummary,
  GridLevel,
  LevelExecutionResult,
  LiquidityPool,
  PriceSource,
  TokenSlot,
} from '../../types';
import { CustodyLedger } from '../../core/custody/custody-ledger';
import { GridEventBus } from '../../core/events/grid-event-bus';
import {
  GridBotError,
  OracleUnavailableError,
  SlippageExceededError,
  errorMessage,
} from '../../core/errors';
import { SlippageGuard } from '../../core/risk-management/slippage-guard';
import { createLogger, formatPrice } from '../../utils';
import { GridLevelBook } from './grid-level-book';
import { evaluateLevel } from './trigger-evaluator';

/**
 * The state the engine reads and mutates. Supplied by the bot so the engine
 * never holds configuration of its own.
 */
export interface GridRuntime {
  readonly pool: LiquidityPool;
  readonly levels: GridLevelBook;
  readonly ledger: CustodyLedger;
  readonly clock: Clock;
  readonly events: GridEventBus;
  /** identity swaps pay out to */
  readonly account: string;
  getConfig(): Readonly<GridConfig> | undefined;
  getPriceSource(): PriceSource | undefined;
  getSlippageGuard(): SlippageGuard | undefined;
  getCooldownSeconds(): number;
  isPaused(): boolean;
}

export interface ExecutionRequest {
  trigger: ExecutionTrigger;
  /** level indices to consider; every level when omitted */
  candidates?: readonly number[];
  /** a price already read in this invocation */
  price?: bigint;
}

interface PreparedExecution {
  config: Readonly<GridConfig>;
  priceSource: PriceSource;
  guard: SlippageGuard;
}

export function summarize(
  trigger: ExecutionTrigger,
  timestamp: number,
  price: bigint | null,
  results: LevelExecutionResult[]
): GridExecutionSummary {
  return {
    trigger,
    timestamp,
    price,
    results,
    executed: results.filter(r => r.status === 'executed').length,
    skipped: results.filter(r => r.status === 'skipped').length,
    failed: results.filter(r => r.status === 'failed').length,
  };
}

/**
 * Walks levels in ascending index order, swapping each one that is active,
 * triggered and out of cooldown. A failing level becomes a failed result and
 * the walk continues with the next one.
 */
export class GridExecutionEngine {
  private logger = createLogger('grid-engine');

  constructor(private readonly runtime: GridRuntime) {}

  async execute(request: ExecutionRequest): Promise<GridExecutionSummary> {
    const { config, priceSource, guard } = this.prepare();
    const now = this.runtime.clock.now();
    const indices = this.resolveCandidates(request.candidates);

    if (indices.length === 0) {
      return summarize(request.trigger, now, request.price ?? null, []);
    }

    let price: bigint;
    try {
      price = request.price ?? (await priceSource.computeTwapPrice());
    } catch (error) {
      if (!(error instanceof OracleUnavailableError)) {
        throw error;
      }
      this.logger.warn('Oracle unavailable, no level can be evaluated', {
        trigger: request.trigger,
        error: error.message,
      });
      const results = indices.map(index => this.oracleFailure(this.runtime.levels.get(index), error));
      return summarize(request.trigger, now, null, results);
    }

    const results: LevelExecutionResult[] = [];
    for (const index of indices) {
      results.push(await this.executeLevel(this.runtime.levels.get(index), price, now, config, guard));
    }

    const summary = summarize(request.trigger, now, price, results);
    if (summary.executed > 0 || summary.failed > 0) {
      this.logger.info(
        `Grid pass (${request.trigger}) @ ${formatPrice(price)}: ${summary.executed} executed, ${summary.failed} failed, ${summary.skipped} skipped`
      );
    } else {
      this.logger.debug(`Grid pass (${request.trigger}) @ ${formatPrice(price)}: nothing to do`);
    }
    return summary;
  }

  private prepare(): PreparedExecution {
    const config = this.runtime.getConfig();
    const priceSource = this.runtime.getPriceSource();
    const guard = this.runtime.getSlippageGuard();
    if (!config || !priceSource || !guard) {
      throw new GridBotError('NOT_CONFIGURED', 'Grid is not configured');
    }
    if (!this.runtime.levels.isInitialized()) {
      throw new GridBotError('NOT_INITIALIZED', 'Grid levels are not initialized');
    }
    return { config, priceSource, guard };
  }

  private resolveCandidates(candidates?: readonly number[]): number[] {
    if (!candidates) {
      return this.runtime.levels.indices();
    }
    const unique = new Set(candidates.filter(index => this.runtime.levels.has(index)));
    return [...unique].sort((a, b) => a - b);
  }

  private async executeLevel(
    level: GridLevel,
    price: bigint,
    now: number,
    config: Readonly<GridConfig>,
    guard: SlippageGuard
  ): Promise<LevelExecutionResult> {
    const evaluation = evaluateLevel(level, price, now, this.runtime.getCooldownSeconds());
    if (!evaluation.eligible) {
      return { status: 'skipped', index: level.index, side: level.side, reason: evaluation.reason };
    }

    const selling = level.side === 'sell';
    const slotIn: TokenSlot = selling ? 'A' : 'B';
    const slotOut: TokenSlot = selling ? 'B' : 'A';
    const amountIn = selling ? config.orderSizeA : config.orderSizeB;

    if (!this.runtime.ledger.canDebit(slotIn, amountIn)) {
      return this.failure(
        level,
        'insufficient-balance',
        `token${slotIn} balance ${this.runtime.ledger.balanceOf(slotIn)} is below order size ${amountIn}`
      );
    }

    let minAmountOut: bigint;
    try {
      const expected = selling ? guard.quoteSell(amountIn, price) : guard.quoteBuy(amountIn, price);
      minAmountOut = guard.minimumOutput(expected);
    } catch (error) {
      return this.failure(level, 'oracle-unavailable', errorMessage(error));
    }

    let amountOut: bigint;
    try {
      const receipt = await this.runtime.pool.swapExactInput({
        tokenIn: selling ? config.tokenA : config.tokenB,
        tokenOut: selling ? config.tokenB : config.tokenA,
        fee: config.feeTier,
        amountIn,
        amountOutMinimum: minAmountOut,
        recipient: this.runtime.account,
      });
      amountOut = receipt.amountOut;
    } catch (error) {
      const reason: FailureReason =
        error instanceof SlippageExceededError ? 'slippage-exceeded' : 'swap-failed';
      return this.failure(level, reason, errorMessage(error));
    }

    // a pool that returns less than the bound is treated as a reverted swap
    const check = guard.validateOutput(amountOut, minAmountOut);
    if (!check.valid) {
      return this.failure(level, 'slippage-exceeded', check.reason ?? 'output below minimum');
    }

    this.runtime.ledger.debit(slotIn, amountIn);
    this.runtime.ledger.credit(slotOut, amountOut);
    this.runtime.levels.recordExecution(level.index, now);

    this.logger.info(
      `Level ${level.index} ${level.side.toUpperCase()} @ ${formatPrice(level.price)}: ${amountIn} token${slotIn} -> ${amountOut} token${slotOut}`
    );
    this.runtime.events.emit('levelExecuted', {
      index: level.index,
      side: level.side,
      amountIn,
      amountOut,
      price,
      timestamp: now,
    });

    return {
      status: 'executed',
      index: level.index,
      side: level.side,
      amountIn,
      amountOut,
      minAmountOut,
    };
  }

  private oracleFailure(level: GridLevel, error: OracleUnavailableError): LevelExecutionResult {
    if (!level.active) {
      return { status: 'skipped', index: level.index, side: level.side, reason: 'inactive' };
    }
    return this.failure(level, 'oracle-unavailable', error.message);
  }

  private failure(level: GridLevel, reason: FailureReason, message: string): LevelExecutionResult {
    this.logger.warn(`Level ${level.index} ${level.side} failed: ${reason}`, { message });
    this.runtime.events.emit('levelFailed', { index: level.index, side: level.side, reason, message });
    return { status: 'failed', index: level.index, side: level.side, reason, message };
  }
}
