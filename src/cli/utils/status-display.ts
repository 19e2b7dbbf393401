import chalk from 'chalk';
import { GridConfig, GridLevel } from '../../types';
import { isGridBotError } from '../../core/errors';
import { GridTradingBot } from '../../strategies/grid/grid-trading-bot';
import { TokenInfo } from '../../config/grid-config-loader';
import { formatAmount, formatPrice } from '../../utils';
import { renderTable } from './error-handler';

export interface BotStatus {
  owner: string;
  paused: boolean;
  cooldownSeconds: number;
  tokenA: TokenInfo;
  tokenB: TokenInfo;
  config?: Readonly<GridConfig>;
  /** null when no price can be read */
  price: bigint | null;
  balanceA: bigint;
  balanceB: bigint;
  levels: GridLevel[];
}

export async function collectStatus(
  bot: GridTradingBot,
  tokenA: TokenInfo,
  tokenB: TokenInfo
): Promise<BotStatus> {
  let price: bigint | null = null;
  try {
    price = await bot.getCurrentPrice();
  } catch (error) {
    if (!isGridBotError(error)) {
      throw error;
    }
  }

  return {
    owner: bot.getOwner(),
    paused: bot.isPaused(),
    cooldownSeconds: bot.getCooldownSeconds(),
    tokenA,
    tokenB,
    config: bot.getGridConfig(),
    price,
    balanceA: bot.getBalanceA(),
    balanceB: bot.getBalanceB(),
    levels: bot.getGridLevels(),
  };
}

function formatTimestamp(seconds: number | null): string {
  return seconds === null ? '-' : new Date(seconds * 1000).toISOString().replace('T', ' ').slice(0, 19);
}

export function formatStatus(status: BotStatus): string[] {
  const { tokenA, tokenB } = status;
  const pair = `${tokenA.symbol}/${tokenB.symbol}`;
  const lines = [
    chalk.bold.cyan(`Grid Bot ${pair}`),
    `  Owner:     ${status.owner}`,
    `  Status:    ${status.paused ? chalk.yellow('PAUSED') : chalk.green('ACTIVE')}`,
    `  Cooldown:  ${status.cooldownSeconds}s`,
    `  Price:     ${status.price === null ? '-' : `${formatPrice(status.price)} ${tokenB.symbol}`}`,
    `  Balance A: ${formatAmount(status.balanceA, tokenA.decimals)} ${tokenA.symbol}`,
    `  Balance B: ${formatAmount(status.balanceB, tokenB.decimals)} ${tokenB.symbol}`,
  ];

  if (!status.config) {
    lines.push(chalk.yellow('  Grid not configured'));
    return lines;
  }

  const config = status.config;
  lines.push(
    `  Range:     ${formatPrice(config.lowerPrice)} - ${formatPrice(config.upperPrice)} ${tokenB.symbol}`,
    `  Levels:    ${config.levelCount}`,
    `  Orders:    ${formatAmount(config.orderSizeA, tokenA.decimals)} ${tokenA.symbol} / ${formatAmount(config.orderSizeB, tokenB.decimals)} ${tokenB.symbol}`,
    `  Pool fee:  ${config.feeTier}`,
    `  Slippage:  ${config.maxSlippageBps} bps`
  );

  if (status.levels.length === 0) {
    lines.push(chalk.yellow('  Levels not initialized'));
    return lines;
  }

  lines.push('');
  lines.push(
    ...renderTable(
      status.levels.map(level => ({
        '#': String(level.index),
        Price: formatPrice(level.price, 2),
        Side: level.side.toUpperCase(),
        Active: level.active ? 'yes' : 'no',
        'Last executed': formatTimestamp(level.lastExecutedAt),
        Fills: String(level.executionCount),
      }))
    )
  );
  return lines;
}

export function displayStatus(status: BotStatus): void {
  formatStatus(status).forEach(line => console.log(line));
}
