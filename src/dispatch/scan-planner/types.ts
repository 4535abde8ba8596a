/**
 * Scan Planner Types
 */

import type { CarLifecycleState, CarState, Direction } from '../types.js';

export interface StopPlan {
  /** Next floor to command, or null when the car should rest */
  nextFloor: number | null;
  direction: Direction;
  /** True when the plan flips the car's current direction */
  reversed: boolean;
  state: Extract<CarLifecycleState, 'scanning' | 'resting'>;
}

export interface IScanPlanner {
  /** Compute the next stop without touching the car */
  plan(car: CarState): StopPlan;

  /** Compute the next stop and apply its direction and lifecycle state */
  nextStop(car: CarState): StopPlan;

  /** The stop the car is currently committed to in its direction, if any */
  primaryTarget(car: CarState): number | null;
}
