import { Command } from 'commander';
import chalk from 'chalk';
import { loadEventScript, runScript } from '../../replay/index.js';
import type { ReplayResult } from '../../replay/index.js';
import { loadRuntimeConfig, toDispatcherOptions, isTraceEnabled } from '../../infra/config/index.js';
import { debugEmitter } from '../../debug/index.js';
import type { DebugEvent } from '../../debug/index.js';
import { formatCar, formatCommand, formatEvent } from '../format.js';

interface ReplayCommandOptions {
  json?: boolean;
  debug?: boolean;
  stopOnError?: boolean;
}

function printTrace(event: DebugEvent): void {
  const tick = event.tick !== undefined ? `t${event.tick} ` : '';
  console.log(chalk.gray(`  · ${tick}${event.type} ${JSON.stringify(event.data)}`));
}

function printTranscript(result: ReplayResult): void {
  if (result.name) {
    console.log(chalk.cyan(`\n${result.name}\n`));
  }

  console.log(chalk.white('init'));
  for (const command of result.initialCommands) {
    console.log(chalk.green(`  ${formatCommand(command)}`));
  }

  for (const step of result.steps) {
    const tick = step.event.tick !== undefined ? chalk.gray(`[t${step.event.tick}] `) : '';
    console.log(`${tick}${chalk.white(formatEvent(step.event))}`);
    if (step.error) {
      console.log(chalk.red(`  ✗ ${step.error.message}`));
    }
    for (const command of step.commands) {
      console.log(chalk.green(`  ${formatCommand(command)}`));
    }
  }

  console.log(chalk.cyan('\nFleet:'));
  for (const car of result.snapshot.cars) {
    console.log(`  ${formatCar(car)}`);
  }

  const { metrics } = result;
  console.log(chalk.cyan('\nMetrics:'));
  console.log(chalk.white('  Events:'), metrics.eventsProcessed);
  console.log(chalk.white('  Calls:'), `${metrics.callsCleared}/${metrics.callsRegistered} cleared, ${metrics.callsPending} pending`);
  console.log(chalk.white('  Moves:'), metrics.movesIssued);
  console.log(chalk.white('  Reversals:'), metrics.directionReversals);
  console.log(chalk.white('  Energy:'), metrics.totalEnergy);
  console.log(chalk.white('  Wait (avg/max ticks):'), `${metrics.averageCallWaitTicks.toFixed(1)}/${metrics.maxCallWaitTicks}`);

  if (!result.completed) {
    console.log(chalk.yellow('\nReplay stopped at the first rejected event'));
  }
  console.log();
}

function replayAction(scriptPath: string, options: ReplayCommandOptions): void {
  const config = loadRuntimeConfig();
  const dispatcherOptions = toDispatcherOptions(config);
  if (options.debug) {
    dispatcherOptions.debug = true;
  }

  const trace = !options.json && (options.debug || isTraceEnabled());
  if (trace) {
    debugEmitter.enable();
    debugEmitter.onDebug(printTrace);
  }

  try {
    const result = runScript(loadEventScript(scriptPath), {
      dispatcher: dispatcherOptions,
      stopOnError: options.stopOnError,
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printTranscript(result);
    }

    if (result.steps.some((step) => step.error)) {
      process.exitCode = 1;
    }
  } finally {
    if (trace) {
      debugEmitter.offDebug(printTrace);
      debugEmitter.disable();
    }
  }
}

export const replayCommand = new Command('replay')
  .description('Replay an event script through the dispatcher')
  .argument('<script>', 'Path to the event script (JSON)')
  .option('--json', 'Print the transcript as JSON')
  .option('--debug', 'Log dispatcher decisions and trace instrumentation events')
  .option('--stop-on-error', 'Stop at the first rejected event')
  .action(replayAction);
