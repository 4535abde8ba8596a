/**
 * Dispatch Core Types
 */

// ============================================================================
// Directions and Lifecycle
// ============================================================================

export type Direction = 'up' | 'down' | 'none';

/** Direction a hall call asks to travel in */
export type CallDirection = Exclude<Direction, 'none'>;

export type CarLifecycleState = 'resting' | 'scanning' | 'loading';

export type CarId = number;
export type PassengerId = number;

// ============================================================================
// Fleet Model
// ============================================================================

export interface FloorZone {
  low: number;
  high: number;
}

export interface CarState {
  id: CarId;
  /** Position of the car in the fleet, used for zone partitioning */
  index: number;
  currentFloor: number;
  direction: Direction;
  lifecycleState: CarLifecycleState;
  /** Obligated stops: assigned hall calls plus in-cabin destinations */
  targetFloors: Set<number>;
  homeFloor: number;
  homeZone: FloorZone;
  /** Floor where the car last came to rest */
  restFloor: number;
  capacity: number;
  onboard: Map<PassengerId, number>;
  /** Floor of the last move command issued and not yet reached */
  commandedFloor?: number;
}

export interface CarSpec {
  id: CarId;
  capacity: number;
}

export interface FleetSpec {
  cars: CarSpec[];
  /** Number of floors served; floors are indexed 0..floors-1 */
  floors: number;
}

export interface FloorCallState {
  floor: number;
  hasUpCall: boolean;
  hasDownCall: boolean;
}

export interface Call {
  floor: number;
  direction: CallDirection;
}

export interface CarSnapshot {
  id: CarId;
  currentFloor: number;
  direction: Direction;
  lifecycleState: CarLifecycleState;
  targetFloors: number[];
  homeFloor: number;
  homeZone: FloorZone;
  capacity: number;
  onboard: Array<{ passengerId: PassengerId; destination: number }>;
}

export interface FleetSnapshot {
  maxFloor: number;
  cars: CarSnapshot[];
  floors: FloorCallState[];
}

// ============================================================================
// Inbound Events
// ============================================================================

interface DispatchInputBase {
  /** Simulation tick the event belongs to, if the engine provides one */
  tick?: number;
}

export interface CallInput extends DispatchInputBase {
  type: 'call';
  floor: number;
  direction: CallDirection;
}

export interface StoppedInput extends DispatchInputBase {
  type: 'stopped';
  carId: CarId;
  floor: number;
}

export interface BoardInput extends DispatchInputBase {
  type: 'board';
  carId: CarId;
  passengerId: PassengerId;
  destination: number;
}

export interface AlightInput extends DispatchInputBase {
  type: 'alight';
  carId: CarId;
  passengerId: PassengerId;
  floor: number;
}

export interface IdleInput extends DispatchInputBase {
  type: 'idle';
  carId: CarId;
}

export interface PassingInput extends DispatchInputBase {
  type: 'passing';
  carId: CarId;
  floor: number;
}

export type DispatchInput =
  | CallInput
  | StoppedInput
  | BoardInput
  | AlightInput
  | IdleInput
  | PassingInput;

export type DispatchInputType = DispatchInput['type'];

// ============================================================================
// Outbound Commands
// ============================================================================

export interface MoveCommand {
  carId: CarId;
  targetFloor: number;
  /** Bypasses queuing; only used for startup placement */
  immediate: boolean;
}

// ============================================================================
// Dispatcher Notifications
// ============================================================================

export type DispatchNotificationType =
  | 'fleet_initialized'
  | 'call_registered'
  | 'call_assigned'
  | 'call_pending'
  | 'call_cleared'
  | 'car_woken'
  | 'car_resting'
  | 'car_state_changed'
  | 'direction_reversed'
  | 'move_issued'
  | 'energy_warning'
  | 'energy_exceeded';

export interface DispatchNotification {
  type: DispatchNotificationType;
  timestamp: number;
  tick?: number;
  carId?: CarId;
  floor?: number;
  data?: Record<string, unknown>;
}

export type DispatchNotificationHandler = (notification: DispatchNotification) => void | Promise<void>;
