import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ZonePartitioner } from '../../dispatch/zone-partitioner/index.js';
import { loadRuntimeConfig } from '../../infra/config/index.js';
import { formatZone } from '../format.js';

interface ZonesCommandOptions {
  floors: number;
  cars: number;
  overlap?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseFraction(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Must be a number between 0 and 1.');
  }
  return parsed;
}

function zonesAction(options: ZonesCommandOptions): void {
  const overlap = options.overlap ?? loadRuntimeConfig().dispatch.zoneOverlap;
  const partitioner = new ZonePartitioner(options.floors - 1, { overlap });

  console.log(chalk.cyan(`\n${options.floors} floors, ${options.cars} cars, overlap ${overlap}\n`));
  for (const assignment of partitioner.partition(options.cars)) {
    console.log(
      chalk.white(`  car #${assignment.index}`),
      `home ${chalk.green(String(assignment.homeFloor))}`,
      `zone ${formatZone(assignment.zone)}`
    );
  }
  console.log();
}

export const zonesCommand = new Command('zones')
  .description('Show the home floor and zone of every car')
  .requiredOption('--floors <n>', 'Number of floors in the building', parsePositiveInt)
  .requiredOption('--cars <m>', 'Number of cars', parsePositiveInt)
  .option('--overlap <fraction>', 'Zone overlap as a fraction of the zone size', parseFraction)
  .action(zonesAction);
