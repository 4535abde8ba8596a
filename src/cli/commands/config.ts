import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { getRuntimeConfigPath, loadRuntimeConfig } from '../../infra/config/index.js';

function showConfig(): void {
  const configPath = getRuntimeConfigPath();
  const config = loadRuntimeConfig();

  console.log(chalk.cyan('\nEffective Configuration:\n'));
  console.log(chalk.white('  File:'), configPath, fs.existsSync(configPath) ? '' : chalk.gray('(not found, defaults)'));
  console.log(chalk.white('  Debug logging:'), config.debug.loggingEnabled ? chalk.green('on') : chalk.gray('off'));
  console.log();
  console.log(JSON.stringify(config, null, 2));
  console.log();
}

function showPath(): void {
  console.log(getRuntimeConfigPath());
}

export const configCommand = new Command('config')
  .description('Inspect dispatcher configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(showConfig);

configCommand
  .command('path')
  .description('Print the configuration file path')
  .action(showPath);
