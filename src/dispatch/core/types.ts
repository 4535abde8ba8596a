/**
 * Dispatcher Core Types
 */

import type {
  CallDirection,
  CarId,
  CarSnapshot,
  DispatchInput,
  DispatchNotificationHandler,
  FleetSnapshot,
  FleetSpec,
  MoveCommand,
  PassengerId,
} from '../types.js';
import type { IScanPlanner } from '../scan-planner/index.js';
import type { IDispatchScorer, ScoringPolicy } from '../scorer/index.js';
import type { EnergyStatus, EnergyTrackerConfig, IEnergyTracker } from '../energy-tracker/index.js';

export interface DispatcherConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Scoring constants used to rank cars */
  scoring: ScoringPolicy;
  /** Zone widening on each side, as a fraction of the segment size */
  zoneOverlap: number;
  /** Send resting cars back toward their zone center */
  driftEnabled: boolean;
  /** Floors a resting car may sit away from its zone center before drifting */
  driftThreshold: number;
  /** Energy accounting settings */
  energy: Partial<EnergyTrackerConfig>;
}

export type DispatcherOptions = Partial<Omit<DispatcherConfig, 'scoring'>> & {
  scoring?: Partial<ScoringPolicy>;
};

export interface DispatcherDependencies {
  planner: IScanPlanner;
  scorer: IDispatchScorer;
  energyTracker: IEnergyTracker;
}

export interface DispatcherMetrics {
  eventsProcessed: number;
  callsRegistered: number;
  callsCleared: number;
  callsPending: number;
  movesIssued: number;
  directionReversals: number;
  totalEnergy: number;
  /** Mean ticks between a call being registered and cleared */
  averageCallWaitTicks: number;
  maxCallWaitTicks: number;
}

export interface IDispatcher {
  /** Create the fleet and place every car at its home floor */
  initFleet(spec: FleetSpec): MoveCommand[];

  /** Process one inbound event to completion */
  handle(input: DispatchInput): MoveCommand[];

  onCall(floor: number, direction: CallDirection, tick?: number): MoveCommand[];
  onStopped(carId: CarId, floor: number, tick?: number): MoveCommand[];
  onBoard(carId: CarId, passengerId: PassengerId, destination: number, tick?: number): MoveCommand[];
  onAlight(carId: CarId, passengerId: PassengerId, floor: number, tick?: number): MoveCommand[];
  onIdle(carId: CarId, tick?: number): MoveCommand[];
  onPassing(carId: CarId, floor: number, tick?: number): MoveCommand[];

  /** Whether any hall call is waiting anywhere in the building */
  hasPendingRequests(): boolean;

  /** Read-only copy of one car */
  getCar(carId: CarId): CarSnapshot;

  /** Read-only copy of every car and floor */
  getFleetSnapshot(): FleetSnapshot;

  getMetrics(): DispatcherMetrics;

  getEnergyStatus(carId: CarId): EnergyStatus;

  /** Subscribe to dispatcher notifications */
  on(handler: DispatchNotificationHandler): void;

  /** Unsubscribe from dispatcher notifications */
  off(handler: DispatchNotificationHandler): void;
}
