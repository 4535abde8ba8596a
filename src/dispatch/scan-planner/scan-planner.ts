/**
 * Scan Planner
 *
 * LOOK discipline, nearest-first: keep the current direction while any
 * target lies ahead, stop at the nearest of them, and reverse only when
 * nothing is left ahead.
 */

import type { CarState, Direction } from '../types.js';
import type { IScanPlanner, StopPlan } from './types.js';
import { directionToward, opposite, targetsAhead } from '../fleet/index.js';

function nearest(from: number, floors: number[]): number {
  let best = floors[0];
  for (const floor of floors) {
    const distance = Math.abs(floor - from);
    const bestDistance = Math.abs(best - from);
    // Equal distance: prefer the upper floor so the choice is stable.
    if (distance < bestDistance || (distance === bestDistance && floor > best)) {
      best = floor;
    }
  }
  return best;
}

export class ScanPlanner implements IScanPlanner {
  plan(car: CarState): StopPlan {
    if (car.targetFloors.size === 0) {
      return { nextFloor: null, direction: 'none', reversed: false, state: 'resting' };
    }

    const targets = [...car.targetFloors];

    if (car.direction === 'none') {
      const next = nearest(car.currentFloor, targets);
      return {
        nextFloor: next,
        direction: directionToward(car.currentFloor, next),
        reversed: false,
        state: 'scanning',
      };
    }

    const ahead = targetsAhead(car, car.direction);
    if (ahead.length > 0) {
      return {
        nextFloor: nearest(car.currentFloor, ahead),
        direction: car.direction,
        reversed: false,
        state: 'scanning',
      };
    }

    const flipped: Direction = opposite(car.direction);
    const behind = targetsAhead(car, flipped);
    if (behind.length > 0) {
      return {
        nextFloor: nearest(car.currentFloor, behind),
        direction: flipped,
        reversed: true,
        state: 'scanning',
      };
    }

    // Only the current floor itself is left.
    return {
      nextFloor: Math.min(...targets),
      direction: car.direction,
      reversed: false,
      state: 'scanning',
    };
  }

  nextStop(car: CarState): StopPlan {
    const plan = this.plan(car);
    car.direction = plan.direction;
    car.lifecycleState = plan.state;
    return plan;
  }

  primaryTarget(car: CarState): number | null {
    if (car.direction === 'none') {
      return null;
    }
    const ahead = targetsAhead(car, car.direction);
    return ahead.length > 0 ? nearest(car.currentFloor, ahead) : null;
  }
}
