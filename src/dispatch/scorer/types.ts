/**
 * Dispatch Scorer Types
 */

import type { CallDirection, CarId, CarState } from '../types.js';

export interface ScoringPolicy {
  /** Base score of a resting car */
  restingBase: number;
  /** Points lost per floor between a resting car and the call */
  restingDistanceWeight: number;
  /** Bonus when the call lies inside the resting car's home zone */
  zoneBonus: number;
  /** Base score of a scanning car the call is on the way for */
  scanningBase: number;
  /** Points lost per floor between a scanning car and the call */
  scanningDistanceWeight: number;
  /** Share of a scanning car's score removed when it is fully loaded (0-1) */
  loadPenalty: number;
}

export interface CandidateScore {
  carId: CarId;
  score: number;
}

export interface IDispatchScorer {
  /** Desirability of `car` answering a call; <= 0 means not a candidate */
  score(car: CarState, callFloor: number, callDirection: CallDirection): number;

  /** Whether the call lies between a scanning car and its next stop */
  isOnTheWay(car: CarState, callFloor: number, callDirection: CallDirection): boolean;

  /** Resting-style score used when an idle car picks a pending call itself */
  affinity(car: CarState, floor: number): number;

  /** Positive-scoring candidates, best first, lowest id first on ties */
  rank(cars: CarState[], callFloor: number, callDirection: CallDirection): CandidateScore[];
}
