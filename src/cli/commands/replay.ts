import { Command } from 'commander';
import chalk from 'chalk';
import { executeCommand, showInfo, showSuccess } from '../utils/error-handler';
import { validatePositiveDecimal, validatePositiveInteger } from '../utils/validation';
import { collectStatus, displayStatus } from '../utils/status-display';
import { createPaperSession, replayPrices } from '../paper-session';
import { DEFAULT_REPLAY_STEP_SECONDS } from '../../config/defaults';
import { loadDotenvEnvironment } from '../../config/environment';
import { loadGridConfigFile, loadPricePath } from '../../config/grid-config-loader';
import { formatAmount, formatPrice, parseAmount } from '../../utils';

interface ReplayCommandOptions {
  config: string;
  prices: string;
  step: string;
  depositA?: string;
  depositB?: string;
}

export const replayCommand = new Command('replay')
  .description('Replay a price path against a paper grid and report every fill')
  .requiredOption('-c, --config <file>', 'Grid config JSON file')
  .requiredOption('--prices <file>', 'JSON array of prices (tokenB per tokenA), the first one is the start price')
  .option('--step <seconds>', 'Seconds between two prices', String(DEFAULT_REPLAY_STEP_SECONDS))
  .option('--deposit-a <decimal>', 'tokenA to deposit before the replay')
  .option('--deposit-b <decimal>', 'tokenB to deposit before the replay')
  .action(async (options: ReplayCommandOptions) => {
    await executeCommand(async () => {
      const stepSeconds = validatePositiveInteger(options.step, 'Step');
      const environment = loadDotenvEnvironment();
      const grid = loadGridConfigFile(options.config);
      const [startPrice, ...path] = loadPricePath(options.prices);

      const session = await createPaperSession({ grid, startPrice, environment });
      const { bot, owner, tokenA, tokenB } = session;

      if (options.depositA) {
        const amount = parseAmount(validatePositiveDecimal(options.depositA, 'Deposit A'), tokenA.decimals);
        await bot.deposit(owner, 'A', amount);
      }
      if (options.depositB) {
        const amount = parseAmount(validatePositiveDecimal(options.depositB, 'Deposit B'), tokenB.decimals);
        await bot.deposit(owner, 'B', amount);
      }

      showInfo(
        `Replaying ${path.length} prices from ${formatPrice(startPrice)}, ${stepSeconds}s apart`
      );
      const report = await replayPrices(session, path, {
        stepSeconds,
        keeperIntervalSeconds: environment.keeperIntervalSeconds,
        onExecution: record => {
          const selling = record.side === 'sell';
          const paid = selling
            ? `${formatAmount(record.amountIn, tokenA.decimals)} ${tokenA.symbol}`
            : `${formatAmount(record.amountIn, tokenB.decimals)} ${tokenB.symbol}`;
          const received = selling
            ? `${formatAmount(record.amountOut, tokenB.decimals)} ${tokenB.symbol}`
            : `${formatAmount(record.amountOut, tokenA.decimals)} ${tokenA.symbol}`;
          const color = selling ? chalk.red : chalk.green;
          console.log(
            color(`  level ${record.index} ${record.side.toUpperCase()} @ ${formatPrice(record.price, 2)}: ${paid} -> ${received}`)
          );
        },
      });

      showSuccess(
        `${report.executions.length} fills over ${report.steps} steps (${report.keeper.upkeepsExecuted} upkeeps, ${report.keeper.errors} errors)`
      );
      displayStatus(await collectStatus(bot, tokenA, tokenB));
    }, 'replay');
  });

replayCommand.addHelpText(
  'after',
  `
Examples:
  $ tickgrid replay --config config/grid.example.json --prices config/prices.example.json --deposit-a 1 --deposit-b 2000
  $ tickgrid replay -c my-grid.json --prices path.json --step 300
`
);
