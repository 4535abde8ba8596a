import {
  directionToward,
  isAhead,
  isFull,
  loadFactor,
  opposite,
  targetsAhead,
} from '../../../src/dispatch/fleet/car-state.js';
import { createCar } from '../../helpers/car-factory.js';

describe('car-state helpers', () => {
  it('should compare floors along a direction', () => {
    expect(isAhead(3, 5, 'up')).toBe(true);
    expect(isAhead(3, 3, 'up')).toBe(false);
    expect(isAhead(3, 1, 'down')).toBe(true);
    expect(isAhead(3, 5, 'down')).toBe(false);
    expect(isAhead(3, 5, 'none')).toBe(false);
  });

  it('should list targets ahead of the car', () => {
    const car = createCar({ currentFloor: 4, targetFloors: new Set([1, 4, 6, 9]) });

    expect(targetsAhead(car, 'up')).toEqual([6, 9]);
    expect(targetsAhead(car, 'down')).toEqual([1]);
  });

  it('should measure load against capacity', () => {
    const car = createCar({ capacity: 2, onboard: new Map([[1, 5]]) });

    expect(loadFactor(car)).toBe(0.5);
    expect(isFull(car)).toBe(false);

    car.onboard.set(2, 7);
    expect(loadFactor(car)).toBe(1);
    expect(isFull(car)).toBe(true);
  });

  it('should flip and derive directions', () => {
    expect(opposite('up')).toBe('down');
    expect(opposite('down')).toBe('up');
    expect(directionToward(2, 5)).toBe('up');
    expect(directionToward(5, 2)).toBe('down');
    expect(directionToward(5, 5)).toBe('none');
  });
});
