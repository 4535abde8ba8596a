/**
 * Energy Tracker Module
 */

export type {
  IEnergyTracker,
  EnergyTrackerConfig,
  EnergyWarningThresholds,
  EnergyWarningLevel,
  EnergyStatus,
  EnergyUsageResult,
} from './types.js';

export { EnergyTracker } from './energy-tracker.js';
