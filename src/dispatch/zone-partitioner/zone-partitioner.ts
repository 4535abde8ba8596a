/**
 * Zone Partitioner
 *
 * Spreads the fleet over the building at startup. Zones only bias
 * scoring; a car is never restricted to its own zone.
 */

import type { FloorZone } from '../types.js';
import type { IZonePartitioner, ZoneAssignment, ZonePartitionerConfig } from './types.js';
import { ConfigurationError } from '../errors.js';

const DEFAULT_CONFIG: ZonePartitionerConfig = {
  overlap: 0,
};

export class ZonePartitioner implements IZonePartitioner {
  private readonly maxFloor: number;
  private readonly config: ZonePartitionerConfig;

  constructor(maxFloor: number, config?: Partial<ZonePartitionerConfig>) {
    if (!Number.isInteger(maxFloor) || maxFloor < 0) {
      throw new ConfigurationError(`building must have at least one floor (maxFloor=${maxFloor})`);
    }
    this.maxFloor = maxFloor;
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.overlap < 0 || this.config.overlap > 1) {
      throw new ConfigurationError(`zone overlap must be within [0, 1] (got ${this.config.overlap})`);
    }
  }

  homeFloor(index: number, total: number): number {
    this.assertIndex(index, total);
    if (total === 1) {
      return Math.floor(this.maxFloor / 2);
    }

    const segment = this.segmentSize(total);
    return Math.min(Math.floor(index * segment + segment / 2), this.maxFloor);
  }

  zoneFor(index: number, total: number): FloorZone {
    this.assertIndex(index, total);
    if (total === 1) {
      return { low: 0, high: this.maxFloor };
    }

    const segment = this.segmentSize(total);
    const low = Math.floor(index * segment);
    const high = index < total - 1
      ? Math.max(low, Math.floor((index + 1) * segment) - 1)
      : this.maxFloor;

    if (this.config.overlap === 0) {
      return { low, high };
    }

    const margin = Math.ceil(segment * this.config.overlap);
    return {
      low: Math.max(0, low - margin),
      high: Math.min(this.maxFloor, high + margin),
    };
  }

  partition(total: number): ZoneAssignment[] {
    return Array.from({ length: total }, (_, index) => ({
      index,
      homeFloor: this.homeFloor(index, total),
      zone: this.zoneFor(index, total),
    }));
  }

  private segmentSize(total: number): number {
    return (this.maxFloor + 1) / total;
  }

  private assertIndex(index: number, total: number): void {
    if (!Number.isInteger(total) || total < 1) {
      throw new ConfigurationError(`fleet must contain at least one car (got ${total})`);
    }
    if (!Number.isInteger(index) || index < 0 || index >= total) {
      throw new ConfigurationError(`car index ${index} outside fleet of ${total}`);
    }
  }
}

/**
 * Floor a resting car drifts back to.
 */
export function zoneCenter(zone: FloorZone): number {
  return Math.floor((zone.low + zone.high) / 2);
}

export function isInZone(floor: number, zone: FloorZone): boolean {
  return floor >= zone.low && floor <= zone.high;
}
