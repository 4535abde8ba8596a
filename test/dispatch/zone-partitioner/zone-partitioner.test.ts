import {
  ZonePartitioner,
  zoneCenter,
  isInZone,
} from '../../../src/dispatch/zone-partitioner/zone-partitioner.js';
import { ConfigurationError } from '../../../src/dispatch/errors.js';

describe('ZonePartitioner', () => {
  describe('homeFloor', () => {
    it('should centre each car in its segment', () => {
      const partitioner = new ZonePartitioner(9);

      expect(partitioner.homeFloor(0, 2)).toBe(2);
      expect(partitioner.homeFloor(1, 2)).toBe(7);
    });

    it('should place a single car mid-building', () => {
      const partitioner = new ZonePartitioner(9);

      expect(partitioner.homeFloor(0, 1)).toBe(4);
    });

    it('should spread three cars over ten floors', () => {
      const partitioner = new ZonePartitioner(9);

      expect([0, 1, 2].map((i) => partitioner.homeFloor(i, 3))).toEqual([1, 5, 8]);
    });
  });

  describe('zoneFor', () => {
    it('should split the building into contiguous zones', () => {
      const partitioner = new ZonePartitioner(9);

      expect(partitioner.zoneFor(0, 2)).toEqual({ low: 0, high: 4 });
      expect(partitioner.zoneFor(1, 2)).toEqual({ low: 5, high: 9 });
    });

    it('should give the last car the remaining floors', () => {
      const partitioner = new ZonePartitioner(9);

      expect(partitioner.partition(3).map((a) => a.zone)).toEqual([
        { low: 0, high: 2 },
        { low: 3, high: 5 },
        { low: 6, high: 9 },
      ]);
    });

    it('should cover the whole building for a single car', () => {
      expect(new ZonePartitioner(9).zoneFor(0, 1)).toEqual({ low: 0, high: 9 });
    });

    it('should widen zones by the overlap margin', () => {
      const partitioner = new ZonePartitioner(9, { overlap: 0.1 });

      expect(partitioner.zoneFor(0, 2)).toEqual({ low: 0, high: 5 });
      expect(partitioner.zoneFor(1, 2)).toEqual({ low: 4, high: 9 });
    });

    it('should put every floor in exactly one zone without overlap', () => {
      const layouts: Array<[floors: number, cars: number]> = [
        [1, 1], [5, 5], [6, 5], [7, 3], [10, 2], [10, 3], [20, 4], [33, 6],
      ];

      for (const [floors, cars] of layouts) {
        const zones = new ZonePartitioner(floors - 1).partition(cars).map((a) => a.zone);
        for (let floor = 0; floor < floors; floor++) {
          const owners = zones.filter((zone) => isInZone(floor, zone));
          expect(owners).toHaveLength(1);
        }
      }
    });
  });

  describe('partition', () => {
    it('should describe every car', () => {
      const partitioner = new ZonePartitioner(9);

      expect(partitioner.partition(2)).toEqual([
        { index: 0, homeFloor: 2, zone: { low: 0, high: 4 } },
        { index: 1, homeFloor: 7, zone: { low: 5, high: 9 } },
      ]);
    });
  });

  describe('validation', () => {
    it('should reject a building without floors', () => {
      expect(() => new ZonePartitioner(-1)).toThrow(ConfigurationError);
    });

    it('should reject an overlap outside [0, 1]', () => {
      expect(() => new ZonePartitioner(9, { overlap: 1.5 })).toThrow(
        'Invalid dispatcher configuration: zone overlap must be within [0, 1] (got 1.5)'
      );
    });

    it('should reject a car index outside the fleet', () => {
      const partitioner = new ZonePartitioner(9);

      expect(() => partitioner.homeFloor(2, 2)).toThrow('car index 2 outside fleet of 2');
      expect(() => partitioner.zoneFor(0, 0)).toThrow(ConfigurationError);
    });
  });

  describe('helpers', () => {
    it('should find the centre floor of a zone', () => {
      expect(zoneCenter({ low: 0, high: 4 })).toBe(2);
      expect(zoneCenter({ low: 5, high: 9 })).toBe(7);
    });

    it('should test zone membership inclusively', () => {
      expect(isInZone(5, { low: 5, high: 9 })).toBe(true);
      expect(isInZone(9, { low: 5, high: 9 })).toBe(true);
      expect(isInZone(4, { low: 5, high: 9 })).toBe(false);
    });
  });
});
