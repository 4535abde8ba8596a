/**
 * Energy Tracker Implementation
 *
 * Accounts floors travelled per car against an optional per-car budget.
 * Reporting only: dispatch decisions do not read it.
 */

import type { CarId } from '../types.js';
import type {
  EnergyStatus,
  EnergyTrackerConfig,
  EnergyUsageResult,
  EnergyWarningLevel,
  EnergyWarningThresholds,
  IEnergyTracker,
} from './types.js';

const DEFAULT_THRESHOLDS: EnergyWarningThresholds = {
  warningThreshold: 0.7,   // 70%
  criticalThreshold: 0.9,  // 90%
};

const DEFAULT_CONFIG: EnergyTrackerConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  budgetPerCar: undefined,
  carWeights: {},
};

const LEVEL_ORDER: Record<EnergyWarningLevel, number> = {
  none: 0,
  warning: 1,
  critical: 2,
  exceeded: 3,
};

interface CarUsage {
  floorsTravelled: number;
  moves: number;
  spent: number;
}

export class EnergyTracker implements IEnergyTracker {
  private config: EnergyTrackerConfig;
  private usage: Map<CarId, CarUsage> = new Map();

  constructor(config?: Partial<EnergyTrackerConfig>) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      thresholds: {
        ...DEFAULT_THRESHOLDS,
        ...config?.thresholds,
      },
      carWeights: { ...config?.carWeights },
    };
  }

  recordTravel(carId: CarId, fromFloor: number, toFloor: number): EnergyUsageResult {
    const before = this.getEnergyStatus(carId).warningLevel;
    const floors = Math.abs(toFloor - fromFloor);

    if (floors > 0) {
      const usage = this.getUsage(carId);
      usage.floorsTravelled += floors;
      usage.moves++;
      usage.spent += floors * this.weightFor(carId);
    }

    const status = this.getEnergyStatus(carId);
    if (LEVEL_ORDER[status.warningLevel] > LEVEL_ORDER[before]) {
      return { status, escalatedFrom: before };
    }
    return { status };
  }

  getEnergyStatus(carId: CarId): EnergyStatus {
    const usage = this.usage.get(carId) ?? { floorsTravelled: 0, moves: 0, spent: 0 };
    const limit = this.config.budgetPerCar;

    return {
      carId,
      floorsTravelled: usage.floorsTravelled,
      moves: usage.moves,
      spent: usage.spent,
      limit,
      remaining: limit !== undefined ? Math.max(0, limit - usage.spent) : undefined,
      warningLevel: this.getWarningLevel(limit, usage.spent),
    };
  }

  getTotalEnergy(): number {
    let total = 0;
    for (const usage of this.usage.values()) {
      total += usage.spent;
    }
    return total;
  }

  getWarningLevel(limit: number | undefined, spent: number): EnergyWarningLevel {
    if (limit === undefined || limit <= 0) {
      return 'none';
    }

    const ratio = spent / limit;
    if (ratio > 1) {
      return 'exceeded';
    }
    if (ratio >= this.config.thresholds.criticalThreshold) {
      return 'critical';
    }
    if (ratio >= this.config.thresholds.warningThreshold) {
      return 'warning';
    }
    return 'none';
  }

  reset(): void {
    this.usage.clear();
  }

  private weightFor(carId: CarId): number {
    return this.config.carWeights[carId] ?? 1;
  }

  private getUsage(carId: CarId): CarUsage {
    let usage = this.usage.get(carId);
    if (!usage) {
      usage = { floorsTravelled: 0, moves: 0, spent: 0 };
      this.usage.set(carId, usage);
    }
    return usage;
  }
}
