import { GridBotEventMap } from '../types';
import { GridTradingBot } from '../strategies/grid/grid-trading-bot';
import { BackupKeeper, KeeperStats } from '../keeper/backup-keeper';
import { SimulatedPool, SimulatedToken } from '../simulation/simulated-pool';
import { ManualClock } from '../simulation/manual-clock';
import { EnvironmentConfig } from '../config/environment';
import { LoadedGridConfig, TokenInfo } from '../config/grid-config-loader';
import { PAPER_OWNER } from '../config/defaults';
import { createLogger, formatPrice } from '../utils';

const logger = createLogger('paper-session');

export interface PaperSession {
  bot: GridTradingBot;
  pool: SimulatedPool;
  clock: ManualClock;
  owner: string;
  tokenA: TokenInfo;
  tokenB: TokenInfo;
}

export interface PaperSessionOptions {
  grid: LoadedGridConfig;
  /** tokenB per tokenA, 18 decimals */
  startPrice: bigint;
  environment: Pick<EnvironmentConfig, 'cooldownSeconds' | 'twapWindowSeconds'>;
  clock?: ManualClock;
}

function toPoolToken(token: TokenInfo): SimulatedToken {
  return { address: token.address, decimals: token.decimals };
}

/**
 * A configured, initialized bot trading against an in-process pool that has
 * sat at `startPrice` for a full TWAP window.
 */
export async function createPaperSession(options: PaperSessionOptions): Promise<PaperSession> {
  const { grid, environment } = options;
  const clock = options.clock ?? new ManualClock();

  // pools order their tokens by address
  const aIsToken0 = grid.tokenA.address.toLowerCase() < grid.tokenB.address.toLowerCase();
  const [token0, token1] = aIsToken0 ? [grid.tokenA, grid.tokenB] : [grid.tokenB, grid.tokenA];

  const pool = new SimulatedPool({
    token0: toPoolToken(token0),
    token1: toPoolToken(token1),
    fee: grid.config.feeTier,
    clock,
    initialPrice: { price: options.startPrice, baseToken: grid.tokenA.address },
    historySeconds: environment.twapWindowSeconds,
  });

  const bot = new GridTradingBot({
    owner: PAPER_OWNER,
    pool,
    clock,
    cooldownSeconds: environment.cooldownSeconds,
    twapWindowSeconds: environment.twapWindowSeconds,
  });

  await bot.configureGrid(PAPER_OWNER, grid.config);
  await bot.initializeLevels(PAPER_OWNER);
  logger.info(
    `Paper session ready: ${grid.tokenA.symbol}/${grid.tokenB.symbol} at ${formatPrice(options.startPrice)}`
  );

  return { bot, pool, clock, owner: PAPER_OWNER, tokenA: grid.tokenA, tokenB: grid.tokenB };
}

export type ExecutionRecord = GridBotEventMap['levelExecuted'];

export interface ReplayOptions {
  stepSeconds: number;
  keeperIntervalSeconds: number;
  onExecution?: (record: ExecutionRecord) => void;
}

export interface ReplayReport {
  steps: number;
  executions: ExecutionRecord[];
  keeper: KeeperStats;
}

/**
 * Walks the pool along `prices`, advancing the clock by `stepSeconds` before
 * each one and giving the backup keeper one check per step.
 */
export async function replayPrices(
  session: PaperSession,
  prices: readonly bigint[],
  options: ReplayOptions
): Promise<ReplayReport> {
  const keeper = new BackupKeeper(session.bot, {
    intervalSeconds: options.keeperIntervalSeconds,
    clock: session.clock,
  });
  const executions: ExecutionRecord[] = [];
  const unsubscribe = session.bot.on('levelExecuted', record => {
    executions.push(record);
    options.onExecution?.(record);
  });

  try {
    for (const price of prices) {
      session.clock.advance(options.stepSeconds);
      session.pool.setPrice(price, session.tokenA.address);
      await keeper.runOnce();
    }
  } finally {
    unsubscribe();
  }

  return { steps: prices.length, executions, keeper: keeper.getStats() };
}
