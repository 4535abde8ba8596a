import { DispatchScorer } from '../../../src/dispatch/scorer/dispatch-scorer.js';
import { DEFAULT_SCORING_POLICY, resolveScoringPolicy } from '../../../src/dispatch/scorer/scoring-policy.js';
import { ScanPlanner } from '../../../src/dispatch/scan-planner/scan-planner.js';
import { createCar } from '../../helpers/car-factory.js';

describe('DispatchScorer', () => {
  let scorer: DispatchScorer;

  const restingLow = () => createCar({ id: 0, currentFloor: 2, homeZone: { low: 0, high: 4 } });
  const restingHigh = () => createCar({ id: 1, index: 1, currentFloor: 7, homeZone: { low: 5, high: 9 } });
  const scanningUp = (onboard = 0) =>
    createCar({
      id: 2,
      currentFloor: 2,
      direction: 'up',
      lifecycleState: 'scanning',
      targetFloors: new Set([8]),
      capacity: 4,
      onboard: new Map(Array.from({ length: onboard }, (_, i): [number, number] => [i, 8])),
    });

  beforeEach(() => {
    scorer = new DispatchScorer(new ScanPlanner());
  });

  describe('resting cars', () => {
    it('should score by distance', () => {
      expect(scorer.score(restingLow(), 5, 'up')).toBe(94);
    });

    it('should add the zone bonus inside the home zone', () => {
      expect(scorer.score(restingHigh(), 5, 'up')).toBe(146);
    });

    it('should ignore call direction', () => {
      expect(scorer.score(restingHigh(), 5, 'down')).toBe(146);
    });
  });

  describe('scanning cars', () => {
    it('should score calls on the way', () => {
      expect(scorer.score(scanningUp(), 6, 'up')).toBe(76);
    });

    it('should discount loaded cars', () => {
      expect(scorer.score(scanningUp(1), 6, 'up')).toBe(66.5);
    });

    it('should not score calls in the other direction', () => {
      expect(scorer.score(scanningUp(), 6, 'down')).toBe(0);
    });

    it('should not score calls beyond the next stop', () => {
      expect(scorer.score(scanningUp(), 9, 'up')).toBe(0);
    });

    it('should not score calls at or behind the car', () => {
      expect(scorer.score(scanningUp(), 2, 'up')).toBe(0);
      expect(scorer.score(scanningUp(), 1, 'up')).toBe(0);
    });

    it('should accept a call at the next stop itself', () => {
      expect(scorer.isOnTheWay(scanningUp(), 8, 'up')).toBe(true);
    });
  });

  describe('ineligible cars', () => {
    it('should score a full car as zero', () => {
      expect(scorer.score(scanningUp(4), 6, 'up')).toBe(0);
      const full = restingLow();
      full.capacity = 1;
      full.onboard.set(1, 9);
      expect(scorer.score(full, 3, 'up')).toBe(0);
    });

    it('should score a loading car as zero', () => {
      const car = restingLow();
      car.lifecycleState = 'loading';
      expect(scorer.score(car, 3, 'up')).toBe(0);
    });
  });

  describe('affinity', () => {
    it('should score any car as if it were resting', () => {
      expect(scorer.affinity(scanningUp(), 3)).toBe(148);
      expect(scorer.affinity(restingHigh(), 0)).toBe(86);
    });
  });

  describe('rank', () => {
    it('should drop zero scores and order by score', () => {
      const ranked = scorer.rank([restingLow(), restingHigh(), scanningUp()], 5, 'down');

      expect(ranked).toEqual([
        { carId: 1, score: 146 },
        { carId: 0, score: 94 },
      ]);
    });

    it('should break ties by the lowest car id', () => {
      const a = createCar({ id: 4, currentFloor: 3 });
      const b = createCar({ id: 3, currentFloor: 7 });

      expect(scorer.rank([a, b], 5, 'up').map((c) => c.carId)).toEqual([3, 4]);
    });
  });

  describe('policy', () => {
    it('should use the configured constants', () => {
      const custom = new DispatchScorer(new ScanPlanner(), { zoneBonus: 0, restingDistanceWeight: 1 });

      expect(custom.score(restingHigh(), 5, 'up')).toBe(98);
    });

    it('should merge partial policies over the defaults', () => {
      expect(resolveScoringPolicy({ loadPenalty: 0.25 })).toEqual({
        ...DEFAULT_SCORING_POLICY,
        loadPenalty: 0.25,
      });
    });
  });
});
