/**
 * Replay Types
 */

import type { CarSpec, DispatchInput, FleetSnapshot, MoveCommand } from '../dispatch/types.js';
import type { DispatcherMetrics, DispatcherOptions } from '../dispatch/core/index.js';

/**
 * A recorded run: the building, its cars and the events the engine reported.
 */
export interface EventScript {
  name?: string;
  floors: number;
  cars: CarSpec[];
  events: DispatchInput[];
}

export interface ReplayStepError {
  code: number;
  name: string;
  message: string;
}

export interface ReplayStep {
  /** Position of the event in the script */
  index: number;
  event: DispatchInput;
  commands: MoveCommand[];
  error?: ReplayStepError;
}

export interface ReplayOptions {
  dispatcher?: DispatcherOptions;
  /** Stop at the first event the dispatcher rejects (default: record it and go on) */
  stopOnError?: boolean;
}

export interface ReplayResult {
  name?: string;
  initialCommands: MoveCommand[];
  steps: ReplayStep[];
  /** True when every event was processed */
  completed: boolean;
  snapshot: FleetSnapshot;
  metrics: DispatcherMetrics;
}
