import { formatCar, formatCommand, formatEvent, formatZone } from '../../src/cli/format.js';
import type { CarSnapshot } from '../../src/dispatch/types.js';

describe('cli format', () => {
  it('should describe each kind of event', () => {
    expect(formatEvent({ type: 'call', floor: 5, direction: 'up' })).toBe('call 5 up');
    expect(formatEvent({ type: 'stopped', carId: 1, floor: 5 })).toBe('car 1 stopped @ 5');
    expect(formatEvent({ type: 'board', carId: 1, passengerId: 7, destination: 9 })).toBe('car 1 board p7 -> 9');
    expect(formatEvent({ type: 'alight', carId: 1, passengerId: 7, floor: 9 })).toBe('car 1 alight p7 @ 9');
    expect(formatEvent({ type: 'idle', carId: 0 })).toBe('car 0 idle');
    expect(formatEvent({ type: 'passing', carId: 0, floor: 3 })).toBe('car 0 passing 3');
  });

  it('should mark immediate moves', () => {
    expect(formatCommand({ carId: 0, targetFloor: 2, immediate: true })).toBe('car 0 -> 2 (immediate)');
    expect(formatCommand({ carId: 1, targetFloor: 5, immediate: false })).toBe('car 1 -> 5');
  });

  it('should print zones as ranges', () => {
    expect(formatZone({ low: 5, high: 9 })).toBe('5-9');
  });

  it('should summarise a car on one line', () => {
    const car: CarSnapshot = {
      id: 1,
      currentFloor: 6,
      direction: 'up',
      lifecycleState: 'scanning',
      targetFloors: [7, 9],
      homeFloor: 7,
      homeZone: { low: 5, high: 9 },
      capacity: 8,
      onboard: [{ passengerId: 3, destination: 9 }],
    };

    expect(formatCar(car)).toBe('car 1  floor 6  scanning  up  targets 7,9  onboard 1/8');
    expect(formatCar({ ...car, targetFloors: [], onboard: [] })).toBe(
      'car 1  floor 6  scanning  up  targets -  onboard 0/8'
    );
  });
});
