import { Command } from 'commander';
import chalk from 'chalk';
import { executeCommand } from '../utils/error-handler';
import { validatePositiveDecimal } from '../utils/validation';
import { collectStatus, displayStatus } from '../utils/status-display';
import { createPaperSession } from '../paper-session';
import { loadDotenvEnvironment } from '../../config/environment';
import { loadGridConfigFile } from '../../config/grid-config-loader';
import { parsePrice } from '../../utils';

interface LevelsOptions {
  config: string;
  price: string;
}

export const levelsCommand = new Command('levels')
  .description('Show the level ladder a grid config produces at a given price')
  .requiredOption('-c, --config <file>', 'Grid config JSON file')
  .requiredOption('-p, --price <decimal>', 'Current price in tokenB per tokenA')
  .action(async (options: LevelsOptions) => {
    await executeCommand(async () => {
      const price = parsePrice(validatePositiveDecimal(options.price, 'Price'));
      const environment = loadDotenvEnvironment();
      const grid = loadGridConfigFile(options.config);

      console.log(chalk.blue(`📐 Building ${grid.tokenA.symbol}/${grid.tokenB.symbol} grid at ${options.price}`));
      const session = await createPaperSession({ grid, startPrice: price, environment });
      displayStatus(await collectStatus(session.bot, session.tokenA, session.tokenB));
    }, 'levels');
  });

levelsCommand.addHelpText(
  'after',
  `
Examples:
  $ tickgrid levels --config config/grid.example.json --price 2000
  $ tickgrid levels -c my-grid.json -p 0.00052

Levels priced below the given price are buys, the rest sells.
`
);
