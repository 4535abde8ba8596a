/**
 * Dispatch Scorer Implementation
 *
 * Ranks cars for a new hall call. Pure: reads the car records, never
 * mutates them.
 */

import type { CallDirection, CarState } from '../types.js';
import type { CandidateScore, IDispatchScorer, ScoringPolicy } from './types.js';
import type { IScanPlanner } from '../scan-planner/index.js';
import { isAhead, isFull, loadFactor } from '../fleet/index.js';
import { isInZone } from '../zone-partitioner/index.js';
import { resolveScoringPolicy } from './scoring-policy.js';

export class DispatchScorer implements IDispatchScorer {
  private readonly policy: ScoringPolicy;
  private readonly planner: IScanPlanner;

  constructor(planner: IScanPlanner, policy?: Partial<ScoringPolicy>) {
    this.planner = planner;
    this.policy = resolveScoringPolicy(policy);
  }

  score(car: CarState, callFloor: number, callDirection: CallDirection): number {
    if (isFull(car)) {
      return 0;
    }

    switch (car.lifecycleState) {
      case 'resting':
        return this.affinity(car, callFloor);

      case 'scanning': {
        if (!this.isOnTheWay(car, callFloor, callDirection)) {
          return 0;
        }
        const distance = Math.abs(car.currentFloor - callFloor);
        const base = this.policy.scanningBase - this.policy.scanningDistanceWeight * distance;
        return base * (1 - this.policy.loadPenalty * loadFactor(car));
      }

      case 'loading':
        return 0;
    }
  }

  isOnTheWay(car: CarState, callFloor: number, callDirection: CallDirection): boolean {
    if (car.lifecycleState !== 'scanning' || car.direction !== callDirection) {
      return false;
    }

    const primary = this.planner.primaryTarget(car);
    if (primary === null) {
      return false;
    }

    // Strictly ahead of the car, no further than the stop it is heading to.
    return isAhead(car.currentFloor, callFloor, callDirection)
      && !isAhead(primary, callFloor, callDirection);
  }

  affinity(car: CarState, floor: number): number {
    const distance = Math.abs(car.currentFloor - floor);
    let score = this.policy.restingBase - this.policy.restingDistanceWeight * distance;
    if (isInZone(floor, car.homeZone)) {
      score += this.policy.zoneBonus;
    }
    return score;
  }

  rank(cars: CarState[], callFloor: number, callDirection: CallDirection): CandidateScore[] {
    return cars
      .map((car) => ({ carId: car.id, score: this.score(car, callFloor, callDirection) }))
      .filter((candidate) => candidate.score > 0)
      .sort((a, b) => b.score - a.score || a.carId - b.carId);
  }
}
