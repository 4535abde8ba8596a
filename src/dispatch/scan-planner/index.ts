/**
 * Scan Planner Module
 */

export type { IScanPlanner, StopPlan } from './types.js';
export { ScanPlanner } from './scan-planner.js';
