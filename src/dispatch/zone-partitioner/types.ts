/**
 * Zone Partitioner Types
 */

import type { FloorZone } from '../types.js';

export interface ZonePartitionerConfig {
  /**
   * Fraction of a zone's segment size added on each side (0 = strict
   * partition). Widened zones overlap their neighbours.
   */
  overlap: number;
}

export interface ZoneAssignment {
  index: number;
  homeFloor: number;
  zone: FloorZone;
}

export interface IZonePartitioner {
  /** Evenly spaced home floor for car `index` of `total` */
  homeFloor(index: number, total: number): number;

  /** Service zone for car `index` of `total` */
  zoneFor(index: number, total: number): FloorZone;

  /** Home floor and zone for every car of a fleet */
  partition(total: number): ZoneAssignment[];
}
