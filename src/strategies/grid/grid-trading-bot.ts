import type { Address, Hex } from 'viem';
import {
  Balances,
  Clock,
  GridBotEventName,
  GridConfig,
  GridExecutionSummary,
  GridLevel,
  LiquidityPool,
  PriceSource,
  TokenSlot,
  UpkeepCheck,
} from '../../types';
import { AccessControl } from '../../core/access-control/access-control';
import { systemClock } from '../../core/clock';
import { InvocationQueue } from '../../core/concurrency/invocation-queue';
import { CustodyLedger } from '../../core/custody/custody-ledger';
import { GridEventBus, GridEventListener } from '../../core/events/grid-event-bus';
import { GridBotError, InvalidConfigError } from '../../core/errors';
import { TwapOracle, DEFAULT_TWAP_WINDOW_SECONDS } from '../../core/price-oracle/twap-oracle';
import { SlippageGuard } from '../../core/risk-management/slippage-guard';
import { createLogger, formatPrice } from '../../utils';
import { GridAutomationAdapter } from './grid-automation-adapter';
import { GridCalculator } from './grid-calculator';
import { GridConfigManager } from './grid-config-manager';
import { GridExecutionEngine, GridRuntime } from './grid-execution-engine';
import { GridLevelBook } from './grid-level-book';

export const DEFAULT_COOLDOWN_SECONDS = 60;

function sameToken(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export interface GridTradingBotOptions {
  owner: string;
  pool: LiquidityPool;
  clock?: Clock;
  cooldownSeconds?: number;
  twapWindowSeconds?: number;
  /** identity swaps pay out to */
  account?: string;
}

/**
 * Custodial grid bot over a single pool.
 *
 * Every public call is queued so it runs to completion before the next one
 * starts; validation and authorization happen before any state is touched.
 */
export class GridTradingBot {
  private readonly pool: LiquidityPool;
  private readonly clock: Clock;
  private readonly twapWindowSeconds: number;
  private readonly account: string;
  private cooldownSeconds: number;

  private readonly access: AccessControl;
  private readonly ledger = new CustodyLedger();
  private readonly levels = new GridLevelBook();
  private readonly configManager: GridConfigManager;
  private readonly calculator = new GridCalculator();
  private readonly events = new GridEventBus();
  private readonly queue = new InvocationQueue();
  private readonly engine: GridExecutionEngine;
  private readonly automation: GridAutomationAdapter;

  private oracle?: TwapOracle;
  private guard?: SlippageGuard;
  // token order the ledger's balances belong to; survives a reset
  private heldPair?: { tokenA: Address; tokenB: Address };

  private logger = createLogger('grid-bot');

  constructor(options: GridTradingBotOptions) {
    this.pool = options.pool;
    this.clock = options.clock ?? systemClock;
    this.twapWindowSeconds = options.twapWindowSeconds ?? DEFAULT_TWAP_WINDOW_SECONDS;
    this.account = options.account ?? 'tickgrid';
    this.cooldownSeconds = GridTradingBot.checkCooldown(options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS);
    this.access = new AccessControl(options.owner);
    this.configManager = new GridConfigManager(this.pool);

    const runtime: GridRuntime = {
      pool: this.pool,
      levels: this.levels,
      ledger: this.ledger,
      clock: this.clock,
      events: this.events,
      account: this.account,
      getConfig: () => this.configManager.get(),
      getPriceSource: (): PriceSource | undefined => this.oracle,
      getSlippageGuard: () => this.guard,
      getCooldownSeconds: () => this.cooldownSeconds,
      isPaused: () => this.access.isPaused(),
    };
    this.engine = new GridExecutionEngine(runtime);
    this.automation = new GridAutomationAdapter(runtime, this.engine);
  }

  // ---------------------------------------------------------------------------
  // configuration and levels

  configureGrid(caller: string, config: GridConfig): Promise<Readonly<GridConfig>> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      if (
        this.heldPair &&
        !this.configManager.isConfigured() &&
        !this.ledger.isEmpty() &&
        !(sameToken(this.heldPair.tokenA, config.tokenA) && sameToken(this.heldPair.tokenB, config.tokenB))
      ) {
        throw new InvalidConfigError(
          'tokenA',
          'balances are held for a different tokenA/tokenB order; withdraw them first'
        );
      }

      // nothing is committed until the oracle and guard have been built
      const candidate = this.configManager.prepare(config);
      const oracle = new TwapOracle(this.pool, {
        baseToken: candidate.tokenA,
        quoteToken: candidate.tokenB,
        defaultWindowSeconds: this.twapWindowSeconds,
      });
      const guard = new SlippageGuard({
        maxSlippageBps: candidate.maxSlippageBps,
        poolFee: this.pool.fee,
        baseDecimals: oracle.orientation.baseDecimals,
        quoteDecimals: oracle.orientation.quoteDecimals,
      });

      const stored = this.configManager.configure(candidate);
      this.oracle = oracle;
      this.guard = guard;
      this.heldPair = { tokenA: stored.tokenA, tokenB: stored.tokenB };

      this.logger.info(
        `Grid configured: ${stored.levelCount} levels ${formatPrice(stored.lowerPrice)}-${formatPrice(stored.upperPrice)}, slippage ${stored.maxSlippageBps} bps`
      );
      this.events.emit('configured', { config: stored });
      return stored;
    });
  }

  initializeLevels(caller: string): Promise<GridLevel[]> {
    return this.queue.run(async () => {
      this.access.requireOwner(caller);
      const config = this.configManager.require();
      if (this.levels.isInitialized()) {
        throw new GridBotError('ALREADY_INITIALIZED', 'Grid levels are already initialized');
      }

      const referencePrice = await this.requireOracle().computeTwapPrice();
      this.levels.initialize(this.calculator.buildLevels(config, referencePrice));

      const levels = this.levels.all();
      this.logger.info(
        `Initialized ${levels.length} levels at reference ${formatPrice(referencePrice)}: ${levels.filter(l => l.side === 'buy').length} buy, ${levels.filter(l => l.side === 'sell').length} sell`
      );
      this.events.emit('levelsInitialized', { levelCount: levels.length, referencePrice });
      return levels;
    });
  }

  /**
   * Clears configuration and levels so the grid can be configured again.
   * Owner only, and only while paused. Balances are untouched.
   */
  resetGrid(caller: string): Promise<void> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      this.access.requirePaused('reset the grid');
      this.configManager.reset();
      this.levels.clear();
      this.oracle = undefined;
      this.guard = undefined;
      this.logger.warn('Grid reset: configuration and levels cleared');
      this.events.emit('gridReset', { by: caller });
    });
  }

  // ---------------------------------------------------------------------------
  // custody

  deposit(caller: string, token: TokenSlot, amount: bigint): Promise<bigint> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      this.access.requireNotPaused('deposit');
      this.configManager.require();
      GridTradingBot.checkAmount(amount);

      const balance = this.ledger.credit(token, amount);
      this.logger.info(`Deposited ${amount} token${token}`, { balance });
      this.events.emit('deposited', { token, amount, balance });
      return balance;
    });
  }

  withdraw(caller: string, token: TokenSlot, amount: bigint): Promise<bigint> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      GridTradingBot.checkAmount(amount);

      const balance = this.ledger.debit(token, amount);
      this.logger.info(`Withdrew ${amount} token${token}`, { balance });
      this.events.emit('withdrawn', { token, amount, balance });
      return balance;
    });
  }

  /**
   * Drains both balances to the owner. Works whether or not the bot is paused.
   */
  emergencyWithdrawAll(caller: string): Promise<Balances> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      const drained = this.ledger.drain();
      this.logger.warn('Emergency withdrawal', { ...drained });
      this.events.emit('emergencyWithdrawal', { to: this.access.getOwner(), ...drained });
      return drained;
    });
  }

  // ---------------------------------------------------------------------------
  // access control

  pause(caller: string): Promise<void> {
    return this.queue.run(() => {
      this.access.pause(caller);
      this.logger.warn('Bot paused');
      this.events.emit('paused', { by: caller });
    });
  }

  unpause(caller: string): Promise<void> {
    return this.queue.run(() => {
      this.access.unpause(caller);
      this.logger.info('Bot unpaused');
      this.events.emit('unpaused', { by: caller });
    });
  }

  transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.queue.run(() => {
      const previousOwner = this.access.transferOwnership(caller, newOwner);
      this.logger.info(`Ownership transferred from ${previousOwner} to ${newOwner}`);
      this.events.emit('ownershipTransferred', { previousOwner, newOwner: this.access.getOwner() });
    });
  }

  setCooldownSeconds(caller: string, seconds: number): Promise<void> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      this.cooldownSeconds = GridTradingBot.checkCooldown(seconds);
      this.logger.info(`Cooldown set to ${seconds}s`);
    });
  }

  // ---------------------------------------------------------------------------
  // level administration

  activateLevel(caller: string, index: number): Promise<GridLevel> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      return this.levels.setActive(index, true);
    });
  }

  deactivateLevel(caller: string, index: number): Promise<GridLevel> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      return this.levels.setActive(index, false);
    });
  }

  resetLevelCooldown(caller: string, index: number): Promise<GridLevel> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      return this.levels.resetCooldown(index);
    });
  }

  // ---------------------------------------------------------------------------
  // execution

  /** Manual trigger. Owner only. */
  executeGrid(caller: string): Promise<GridExecutionSummary> {
    return this.queue.run(() => {
      this.access.requireOwner(caller);
      this.access.requireNotPaused('execute the grid');
      return this.engine.execute({ trigger: 'manual' });
    });
  }

  /** Public, side-effect free. */
  checkUpkeep(checkData: Hex = '0x'): Promise<UpkeepCheck> {
    return this.queue.run(() => this.automation.checkUpkeep(checkData));
  }

  /** Public. Re-validates everything; the payload is only a hint. */
  performUpkeep(performData: Hex): Promise<GridExecutionSummary> {
    return this.queue.run(() => {
      this.access.requireNotPaused('perform upkeep');
      return this.automation.performUpkeep(performData);
    });
  }

  // ---------------------------------------------------------------------------
  // reads

  getGridConfig(): Readonly<GridConfig> | undefined {
    return this.configManager.get();
  }

  getGridLevel(index: number): GridLevel {
    return this.levels.get(index);
  }

  getGridLevels(): GridLevel[] {
    return this.levels.all();
  }

  getLevelCount(): number {
    return this.levels.size;
  }

  getBalanceA(): bigint {
    return this.ledger.balanceOf('A');
  }

  getBalanceB(): bigint {
    return this.ledger.balanceOf('B');
  }

  getCurrentPrice(): Promise<bigint> {
    return this.queue.run(() => this.requireOracle().computeTwapPrice());
  }

  getOwner(): string {
    return this.access.getOwner();
  }

  isPaused(): boolean {
    return this.access.isPaused();
  }

  getCooldownSeconds(): number {
    return this.cooldownSeconds;
  }

  /** Subscribes to a notification; returns the unsubscribe function. */
  on<K extends GridBotEventName>(event: K, listener: GridEventListener<K>): () => void {
    return this.events.on(event, listener);
  }

  private requireOracle(): TwapOracle {
    if (!this.oracle) {
      throw new GridBotError('NOT_CONFIGURED', 'Grid is not configured');
    }
    return this.oracle;
  }

  private static checkAmount(amount: bigint): void {
    if (amount <= 0n) {
      throw new GridBotError('INVALID_AMOUNT', `Amount must be greater than zero, got ${amount}`);
    }
  }

  private static checkCooldown(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new InvalidConfigError('cooldownSeconds', `must be a non-negative integer, got ${seconds}`);
    }
    return seconds;
  }
}
