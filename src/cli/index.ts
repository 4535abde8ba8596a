#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { isDispatchError } from '../dispatch/errors.js';
import { replayCommand } from './commands/replay.js';
import { zonesCommand } from './commands/zones.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('liftd')
  .description('Elevator group dispatch: replay event scripts and inspect zoning')
  .version('1.0.0');

program.addCommand(replayCommand);
program.addCommand(zonesCommand);
program.addCommand(configCommand);

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `liftd --help` for available commands'));
  process.exit(1);
});

try {
  program.parse();
} catch (error) {
  if (!isDispatchError(error)) {
    throw error;
  }
  console.error(chalk.red(`✗ ${error.message}`));
  process.exitCode = 1;
}
