export * from './types';
export * from './core/errors';

// Engine
export { GridTradingBot, DEFAULT_COOLDOWN_SECONDS } from './strategies/grid/grid-trading-bot';
export type { GridTradingBotOptions } from './strategies/grid/grid-trading-bot';
export { GridCalculator } from './strategies/grid/grid-calculator';
export {
  GridConfigManager,
  validateGridConfig,
  MIN_LEVEL_COUNT,
  MAX_LEVEL_COUNT,
  MAX_SLIPPAGE_BPS,
} from './strategies/grid/grid-config-manager';
export { encodePerformData, decodePerformData } from './strategies/grid/grid-automation-adapter';

// Pricing
export { TwapOracle, DEFAULT_TWAP_WINDOW_SECONDS } from './core/price-oracle/twap-oracle';
export { SlippageGuard } from './core/risk-management/slippage-guard';
export {
  MIN_TICK,
  MAX_TICK,
  getSqrtRatioAtTick,
  getTickAtSqrtRatio,
  tickToPrice,
  priceToTick,
} from './core/math/tick-math';
export type { PairOrientation } from './core/math/tick-math';

// Automation and simulation
export { BackupKeeper } from './keeper/backup-keeper';
export type { UpkeepTarget, KeeperStats, BackupKeeperOptions } from './keeper/backup-keeper';
export { SimulatedPool } from './simulation/simulated-pool';
export { ManualClock } from './simulation/manual-clock';
export { systemClock } from './core/clock';

// Configuration
export { loadEnvironment } from './config/environment';
export { parseGridConfig, loadGridConfigFile } from './config/grid-config-loader';

export { createLogger, formatPrice, formatAmount, parsePrice, parseAmount } from './utils';
