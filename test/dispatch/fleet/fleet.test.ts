import { Fleet } from '../../../src/dispatch/fleet/fleet.js';
import { ZonePartitioner } from '../../../src/dispatch/zone-partitioner/zone-partitioner.js';
import { ConfigurationError, UnknownCarError } from '../../../src/dispatch/errors.js';
import type { FleetSpec } from '../../../src/dispatch/types.js';

describe('Fleet', () => {
  const spec: FleetSpec = {
    floors: 10,
    cars: [
      { id: 5, capacity: 4 },
      { id: 2, capacity: 6 },
    ],
  };

  const createFleet = (fleetSpec: FleetSpec = spec): Fleet =>
    new Fleet(fleetSpec, new ZonePartitioner(fleetSpec.floors - 1));

  describe('construction', () => {
    it('should order cars by id and zone them in that order', () => {
      const fleet = createFleet();

      const [first, second] = fleet.all();
      expect(first.id).toBe(2);
      expect(first.index).toBe(0);
      expect(first.homeZone).toEqual({ low: 0, high: 4 });
      expect(second.id).toBe(5);
      expect(second.index).toBe(1);
      expect(second.homeZone).toEqual({ low: 5, high: 9 });
    });

    it('should start every car resting at its home floor', () => {
      const car = createFleet().get(5);

      expect(car.currentFloor).toBe(7);
      expect(car.homeFloor).toBe(7);
      expect(car.restFloor).toBe(7);
      expect(car.lifecycleState).toBe('resting');
      expect(car.direction).toBe('none');
      expect(car.targetFloors.size).toBe(0);
      expect(car.onboard.size).toBe(0);
      expect(car.capacity).toBe(4);
    });

    it('should expose size and the top floor', () => {
      const fleet = createFleet();

      expect(fleet.size).toBe(2);
      expect(fleet.maxFloor).toBe(9);
    });
  });

  describe('lookup', () => {
    it('should throw for unknown cars', () => {
      const fleet = createFleet();

      expect(fleet.has(2)).toBe(true);
      expect(fleet.has(3)).toBe(false);
      expect(() => fleet.get(3)).toThrow(UnknownCarError);
      expect(() => fleet.get(3)).toThrow('Unknown car: 3');
    });
  });

  describe('validate', () => {
    it('should reject a building without floors', () => {
      expect(() => Fleet.validate({ floors: 0, cars: [{ id: 0, capacity: 4 }] })).toThrow(
        'Invalid dispatcher configuration: building must have at least one floor (got 0)'
      );
    });

    it('should reject an empty fleet', () => {
      expect(() => Fleet.validate({ floors: 10, cars: [] })).toThrow(ConfigurationError);
    });

    it('should reject duplicate ids', () => {
      expect(() =>
        Fleet.validate({ floors: 10, cars: [{ id: 1, capacity: 4 }, { id: 1, capacity: 4 }] })
      ).toThrow('duplicate car id 1');
    });

    it('should reject negative ids', () => {
      expect(() => Fleet.validate({ floors: 10, cars: [{ id: -1, capacity: 4 }] })).toThrow(
        'car id must be a non-negative integer (got -1)'
      );
    });

    it('should reject a car that cannot carry anyone', () => {
      expect(() => Fleet.validate({ floors: 10, cars: [{ id: 0, capacity: 0 }] })).toThrow(
        'car 0 must have a capacity of at least 1'
      );
    });
  });

  describe('snapshot', () => {
    it('should copy cars with sorted targets', () => {
      const fleet = createFleet();
      const car = fleet.get(2);
      car.targetFloors.add(8);
      car.targetFloors.add(3);
      car.onboard.set(11, 8);

      const [snapshot] = fleet.snapshot();

      expect(snapshot.targetFloors).toEqual([3, 8]);
      expect(snapshot.onboard).toEqual([{ passengerId: 11, destination: 8 }]);

      snapshot.homeZone.low = 3;
      expect(car.homeZone.low).toBe(0);
    });
  });
});
