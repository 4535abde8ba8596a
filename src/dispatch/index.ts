/**
 * Dispatch Module
 *
 * The dispatch core decides which car answers each hall call and where
 * every car goes next:
 * - Zone partitioning and home floors
 * - Hall call registry per floor and direction
 * - Car scoring for new calls
 * - LOOK sweep planning per car
 * - Energy accounting against optional budgets
 */

// Core types
export type {
  Direction,
  CallDirection,
  CarLifecycleState,
  CarId,
  PassengerId,
  FloorZone,
  CarState,
  CarSpec,
  FleetSpec,
  FloorCallState,
  Call,
  CarSnapshot,
  FleetSnapshot,
  DispatchInput,
  DispatchInputType,
  MoveCommand,
  DispatchNotificationType,
  DispatchNotification,
  DispatchNotificationHandler,
} from './types.js';

// Errors
export {
  ErrorCodes,
  ErrorMessages,
  DispatchError,
  ConfigurationError,
  InvalidFloorError,
  UnknownCarError,
  CapacityExceededError,
  isDispatchError,
  assertFloor,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Dispatcher
export type {
  DispatcherConfig,
  DispatcherOptions,
  DispatcherDependencies,
  DispatcherMetrics,
  IDispatcher,
} from './core/index.js';
export { Dispatcher } from './core/index.js';

// Zone Partitioner
export type { IZonePartitioner, ZonePartitionerConfig, ZoneAssignment } from './zone-partitioner/index.js';
export { ZonePartitioner, zoneCenter, isInZone } from './zone-partitioner/index.js';

// Floor Request Registry
export type { IFloorRequestRegistry } from './floor-registry/index.js';
export { FloorRequestRegistry } from './floor-registry/index.js';

// Fleet
export type { IFleet } from './fleet/index.js';
export { Fleet, isFull, loadFactor, toCarSnapshot } from './fleet/index.js';

// Scan Planner
export type { IScanPlanner, StopPlan } from './scan-planner/index.js';
export { ScanPlanner } from './scan-planner/index.js';

// Scorer
export type { IDispatchScorer, ScoringPolicy, CandidateScore } from './scorer/index.js';
export { DispatchScorer, DEFAULT_SCORING_POLICY, resolveScoringPolicy } from './scorer/index.js';

// Energy Tracker
export type {
  IEnergyTracker,
  EnergyTrackerConfig,
  EnergyWarningThresholds,
  EnergyWarningLevel,
  EnergyStatus,
  EnergyUsageResult,
} from './energy-tracker/index.js';
export { EnergyTracker } from './energy-tracker/index.js';
