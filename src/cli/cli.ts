#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { levelsCommand } from './commands/levels';
import { replayCommand } from './commands/replay';

const program = new Command();

program
  .name('tickgrid')
  .description('tickgrid - grid trading over a single liquidity pool, paper mode')
  .version('0.1.0');

program.addCommand(levelsCommand);
program.addCommand(replayCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red(`Unknown command: ${err.message}`));
    console.log(chalk.yellow('Run "tickgrid --help" to see available commands'));
    process.exit(1);
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  throw err;
});

if (process.argv.length === 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
