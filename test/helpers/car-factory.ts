import type { CarState } from '../../src/dispatch/types.js';

export const createCar = (overrides: Partial<CarState> = {}): CarState => ({
  id: 0,
  index: 0,
  currentFloor: 0,
  direction: 'none',
  lifecycleState: 'resting',
  targetFloors: new Set(),
  homeFloor: 0,
  homeZone: { low: 0, high: 9 },
  restFloor: 0,
  capacity: 8,
  onboard: new Map(),
  ...overrides,
});
