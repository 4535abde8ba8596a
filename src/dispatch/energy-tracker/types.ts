/**
 * Energy Tracker Types
 */

import type { CarId } from '../types.js';

export interface EnergyWarningThresholds {
  /** Warn when this share of the budget is used (0-1) */
  warningThreshold: number;
  /** Critical warning threshold (0-1) */
  criticalThreshold: number;
}

export interface EnergyTrackerConfig {
  thresholds: EnergyWarningThresholds;
  /** Per-car energy budget in floor units; undefined means unbounded */
  budgetPerCar?: number;
  /** Energy charged per floor travelled, by car id (default 1) */
  carWeights: Record<number, number>;
}

export type EnergyWarningLevel = 'none' | 'warning' | 'critical' | 'exceeded';

export interface EnergyStatus {
  carId: CarId;
  floorsTravelled: number;
  moves: number;
  spent: number;
  limit?: number;
  remaining?: number;
  warningLevel: EnergyWarningLevel;
}

export interface EnergyUsageResult {
  status: EnergyStatus;
  /** Set when this usage moved the car to a higher warning level */
  escalatedFrom?: EnergyWarningLevel;
}

export interface IEnergyTracker {
  /** Charge a car for travelling between two floors */
  recordTravel(carId: CarId, fromFloor: number, toFloor: number): EnergyUsageResult;

  /** Current status for one car */
  getEnergyStatus(carId: CarId): EnergyStatus;

  /** Total energy spent by the whole fleet */
  getTotalEnergy(): number;

  /** Get warning level for a limit and spend */
  getWarningLevel(limit: number | undefined, spent: number): EnergyWarningLevel;

  /** Forget all recorded usage */
  reset(): void;
}
