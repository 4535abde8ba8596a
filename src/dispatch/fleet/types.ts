/**
 * Fleet Types
 */

import type { CarId, CarSnapshot, CarState } from '../types.js';

export interface IFleet {
  readonly maxFloor: number;
  readonly size: number;

  /** Look up a car; throws UnknownCarError for ids outside the fleet */
  get(carId: CarId): CarState;

  /** Whether the id belongs to the fleet */
  has(carId: CarId): boolean;

  /** Every car, ordered by ascending id */
  all(): CarState[];

  /** Read-only copies of every car */
  snapshot(): CarSnapshot[];
}
