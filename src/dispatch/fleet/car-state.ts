/**
 * Car State Helpers
 *
 * Small queries over a single car record shared by the scorer, the
 * planner and the dispatcher.
 */

import type { CallDirection, CarSnapshot, CarState, Direction } from '../types.js';

export function isFull(car: CarState): boolean {
  return car.onboard.size >= car.capacity;
}

export function loadFactor(car: CarState): number {
  return Math.min(1, car.onboard.size / car.capacity);
}

/**
 * Whether `floor` lies strictly beyond `from` when travelling in `direction`.
 */
export function isAhead(from: number, floor: number, direction: Direction): boolean {
  if (direction === 'up') {
    return floor > from;
  }
  if (direction === 'down') {
    return floor < from;
  }
  return false;
}

export function targetsAhead(car: CarState, direction: Direction): number[] {
  return [...car.targetFloors].filter((floor) => isAhead(car.currentFloor, floor, direction));
}

export function opposite(direction: CallDirection): CallDirection {
  return direction === 'up' ? 'down' : 'up';
}

export function directionToward(from: number, to: number): Direction {
  if (to > from) return 'up';
  if (to < from) return 'down';
  return 'none';
}

export function toCarSnapshot(car: CarState): CarSnapshot {
  return {
    id: car.id,
    currentFloor: car.currentFloor,
    direction: car.direction,
    lifecycleState: car.lifecycleState,
    targetFloors: [...car.targetFloors].sort((a, b) => a - b),
    homeFloor: car.homeFloor,
    homeZone: { ...car.homeZone },
    capacity: car.capacity,
    onboard: [...car.onboard.entries()].map(([passengerId, destination]) => ({
      passengerId,
      destination,
    })),
  };
}
