/**
 * Fleet
 *
 * Owns every car record for one building. Cars are created once from the
 * fleet spec and live until the fleet is dropped.
 */

import type { CarId, CarSnapshot, CarState, FleetSpec } from '../types.js';
import type { IZonePartitioner } from '../zone-partitioner/index.js';
import type { IFleet } from './types.js';
import { ConfigurationError, UnknownCarError } from '../errors.js';
import { toCarSnapshot } from './car-state.js';

export class Fleet implements IFleet {
  readonly maxFloor: number;
  private cars: Map<CarId, CarState> = new Map();

  constructor(spec: FleetSpec, partitioner: IZonePartitioner) {
    Fleet.validate(spec);
    this.maxFloor = spec.floors - 1;

    const ordered = [...spec.cars].sort((a, b) => a.id - b.id);
    ordered.forEach((carSpec, index) => {
      const homeFloor = partitioner.homeFloor(index, ordered.length);
      this.cars.set(carSpec.id, {
        id: carSpec.id,
        index,
        currentFloor: homeFloor,
        direction: 'none',
        lifecycleState: 'resting',
        targetFloors: new Set(),
        homeFloor,
        homeZone: partitioner.zoneFor(index, ordered.length),
        restFloor: homeFloor,
        capacity: carSpec.capacity,
        onboard: new Map(),
      });
    });
  }

  /**
   * Validate a fleet spec without building it.
   */
  static validate(spec: FleetSpec): void {
    if (!Number.isInteger(spec.floors) || spec.floors < 1) {
      throw new ConfigurationError(`building must have at least one floor (got ${spec.floors})`);
    }
    if (spec.cars.length === 0) {
      throw new ConfigurationError('fleet must contain at least one car');
    }

    const seen = new Set<CarId>();
    for (const car of spec.cars) {
      if (!Number.isInteger(car.id) || car.id < 0) {
        throw new ConfigurationError(`car id must be a non-negative integer (got ${car.id})`);
      }
      if (seen.has(car.id)) {
        throw new ConfigurationError(`duplicate car id ${car.id}`);
      }
      if (!Number.isInteger(car.capacity) || car.capacity < 1) {
        throw new ConfigurationError(`car ${car.id} must have a capacity of at least 1`);
      }
      seen.add(car.id);
    }
  }

  get size(): number {
    return this.cars.size;
  }

  get(carId: CarId): CarState {
    const car = this.cars.get(carId);
    if (!car) {
      throw new UnknownCarError(carId);
    }
    return car;
  }

  has(carId: CarId): boolean {
    return this.cars.has(carId);
  }

  all(): CarState[] {
    return Array.from(this.cars.values());
  }

  snapshot(): CarSnapshot[] {
    return this.all().map(toCarSnapshot);
  }
}
