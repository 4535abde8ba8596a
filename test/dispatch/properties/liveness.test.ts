import { Dispatcher } from '../../../src/dispatch/core/dispatcher.js';
import type { FleetSpec } from '../../../src/dispatch/types.js';
import { BuildingSim } from '../../helpers/building-sim.js';

describe('dispatch properties', () => {
  const spec: FleetSpec = {
    floors: 12,
    cars: [
      { id: 0, capacity: 8 },
      { id: 1, capacity: 8 },
    ],
  };

  const runMorning = (dispatcher: Dispatcher): BuildingSim => {
    const sim = new BuildingSim(dispatcher, spec);
    sim.request(1, 0, 9);
    sim.request(2, 11, 3);
    sim.request(3, 5, 6);
    for (let i = 0; i < 3; i++) sim.step();
    sim.request(4, 8, 0);
    sim.request(5, 2, 10);
    for (let i = 0; i < 3; i++) sim.step();
    sim.request(6, 6, 1);
    sim.request(7, 6, 11);
    for (let i = 0; i < 4; i++) sim.step();
    sim.request(8, 0, 11);
    sim.run(400);
    return sim;
  };

  it('should eventually serve every call and deliver every passenger', () => {
    const dispatcher = new Dispatcher();

    const sim = runMorning(dispatcher);

    expect(sim.isSettled()).toBe(true);
    expect([...sim.delivered].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(dispatcher.hasPendingRequests()).toBe(false);
    expect(dispatcher.getMetrics().callsPending).toBe(0);
  });

  it('should never carry more passengers than a car holds', () => {
    const dispatcher = new Dispatcher();
    let maxOnboard = 0;
    dispatcher.on(() => {
      for (const car of dispatcher.getFleetSnapshot().cars) {
        maxOnboard = Math.max(maxOnboard, car.onboard.length);
      }
    });

    runMorning(dispatcher);

    expect(maxOnboard).toBeGreaterThan(0);
    expect(maxOnboard).toBeLessThanOrEqual(8);
  });

  it('should only reverse a car with nothing left ahead', () => {
    const dispatcher = new Dispatcher();
    const violations: number[] = [];
    dispatcher.on((notification) => {
      if (notification.type !== 'direction_reversed' || notification.carId === undefined) {
        return;
      }
      const car = dispatcher.getCar(notification.carId);
      const from = notification.data?.from;
      const aheadOfOldDirection = car.targetFloors.filter((floor) =>
        from === 'up' ? floor > car.currentFloor : floor < car.currentFloor
      );
      if (aheadOfOldDirection.length > 0) {
        violations.push(notification.carId);
      }
    });

    runMorning(dispatcher);

    expect(violations).toEqual([]);
  });

  it('should leave every car resting once the building is quiet', () => {
    const dispatcher = new Dispatcher();

    runMorning(dispatcher);

    for (const car of dispatcher.getFleetSnapshot().cars) {
      expect(car.lifecycleState).toBe('resting');
      expect(car.targetFloors).toEqual([]);
      expect(car.onboard).toEqual([]);
    }
  });
});
