/**
 * Dispatcher Implementation
 *
 * Owns the fleet and the floor call registry for one building and turns
 * every inbound event into zero or more move commands. Each event is
 * processed to completion before the next one is accepted; nothing here
 * blocks or awaits.
 */

import type {
  CallDirection,
  CarId,
  CarLifecycleState,
  CarSnapshot,
  CarState,
  DispatchInput,
  DispatchNotification,
  DispatchNotificationHandler,
  FleetSnapshot,
  FleetSpec,
  MoveCommand,
  PassengerId,
} from '../types.js';
import type {
  DispatcherConfig,
  DispatcherDependencies,
  DispatcherMetrics,
  DispatcherOptions,
  IDispatcher,
} from './types.js';
import type { EnergyStatus } from '../energy-tracker/index.js';
import { EnergyTracker } from '../energy-tracker/index.js';
import { FloorRequestRegistry } from '../floor-registry/index.js';
import { Fleet, directionToward, isFull, opposite, toCarSnapshot } from '../fleet/index.js';
import { ScanPlanner } from '../scan-planner/index.js';
import { DispatchScorer, resolveScoringPolicy } from '../scorer/index.js';
import { ZonePartitioner, zoneCenter } from '../zone-partitioner/index.js';
import { CapacityExceededError, ConfigurationError, assertFloor } from '../errors.js';
import { debug } from '../../debug/index.js';

const DEFAULT_CONFIG: Omit<DispatcherConfig, 'scoring'> = {
  debug: false,
  zoneOverlap: 0,
  driftEnabled: true,
  driftThreshold: 2,
  energy: {},
};

const CALL_DIRECTIONS: CallDirection[] = ['up', 'down'];

interface PendingCallChoice {
  floor: number;
  direction: CallDirection;
  score: number;
}

interface FleetState {
  fleet: Fleet;
  registry: FloorRequestRegistry;
}

export class Dispatcher implements IDispatcher {
  private config: DispatcherConfig;
  private deps: DispatcherDependencies;
  private state: FleetState | null = null;
  private eventHandlers: Set<DispatchNotificationHandler> = new Set();
  private metrics: DispatcherMetrics;
  private callRegisteredAt: Map<string, number> = new Map();
  private measuredWaits = 0;
  private currentTick?: number;

  constructor(options?: DispatcherOptions, deps?: Partial<DispatcherDependencies>) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...options,
      scoring: resolveScoringPolicy(options?.scoring),
    };

    const planner = deps?.planner ?? new ScanPlanner();
    this.deps = {
      planner,
      scorer: deps?.scorer ?? new DispatchScorer(planner, this.config.scoring),
      energyTracker: deps?.energyTracker ?? new EnergyTracker(this.config.energy),
    };
    this.metrics = this.createInitialMetrics();
  }

  private createInitialMetrics(): DispatcherMetrics {
    return {
      eventsProcessed: 0,
      callsRegistered: 0,
      callsCleared: 0,
      callsPending: 0,
      movesIssued: 0,
      directionReversals: 0,
      totalEnergy: 0,
      averageCallWaitTicks: 0,
      maxCallWaitTicks: 0,
    };
  }

  // ==========================================================================
  // Inbound Operations
  // ==========================================================================

  initFleet(spec: FleetSpec): MoveCommand[] {
    Fleet.validate(spec);
    const maxFloor = spec.floors - 1;
    const partitioner = new ZonePartitioner(maxFloor, { overlap: this.config.zoneOverlap });

    this.state = {
      fleet: new Fleet(spec, partitioner),
      registry: new FloorRequestRegistry(maxFloor),
    };
    this.metrics = this.createInitialMetrics();
    this.callRegisteredAt.clear();
    this.measuredWaits = 0;
    this.currentTick = undefined;
    this.deps.energyTracker.reset();

    const cars = this.state.fleet.all();
    this.debug('Fleet initialized:', cars.length, 'cars,', spec.floors, 'floors');
    debug.fleetInitialized({
      floors: spec.floors,
      cars: cars.map((car) => ({ id: car.id, homeFloor: car.homeFloor, homeZone: car.homeZone })),
    });
    this.emitEvent({
      type: 'fleet_initialized',
      timestamp: Date.now(),
      data: { floors: spec.floors, cars: cars.length },
    });

    return cars.map((car) => this.issueMove(car, car.homeFloor, true));
  }

  handle(input: DispatchInput): MoveCommand[] {
    const { fleet } = this.requireState();
    if (input.tick !== undefined) {
      this.currentTick = input.tick;
    }
    this.metrics.eventsProcessed++;

    debug.setContext({
      tick: this.currentTick,
      carId: 'carId' in input ? input.carId : undefined,
    });

    try {
      switch (input.type) {
        case 'call':
          return this.handleCall(input.floor, input.direction);
        case 'stopped':
          return this.handleStopped(fleet.get(input.carId), input.floor);
        case 'board':
          return this.handleBoard(fleet.get(input.carId), input.passengerId, input.destination);
        case 'alight':
          return this.handleAlight(fleet.get(input.carId), input.passengerId, input.floor);
        case 'idle':
          return this.handleIdle(fleet.get(input.carId));
        case 'passing':
          return this.handlePassing(fleet.get(input.carId), input.floor);
      }
    } finally {
      debug.clearContext();
    }
  }

  onCall(floor: number, direction: CallDirection, tick?: number): MoveCommand[] {
    return this.handle({ type: 'call', floor, direction, tick });
  }

  onStopped(carId: CarId, floor: number, tick?: number): MoveCommand[] {
    return this.handle({ type: 'stopped', carId, floor, tick });
  }

  onBoard(carId: CarId, passengerId: PassengerId, destination: number, tick?: number): MoveCommand[] {
    return this.handle({ type: 'board', carId, passengerId, destination, tick });
  }

  onAlight(carId: CarId, passengerId: PassengerId, floor: number, tick?: number): MoveCommand[] {
    return this.handle({ type: 'alight', carId, passengerId, floor, tick });
  }

  onIdle(carId: CarId, tick?: number): MoveCommand[] {
    return this.handle({ type: 'idle', carId, tick });
  }

  onPassing(carId: CarId, floor: number, tick?: number): MoveCommand[] {
    return this.handle({ type: 'passing', carId, floor, tick });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  hasPendingRequests(): boolean {
    return this.requireState().registry.hasAny();
  }

  getCar(carId: CarId): CarSnapshot {
    return toCarSnapshot(this.requireState().fleet.get(carId));
  }

  getFleetSnapshot(): FleetSnapshot {
    const { fleet, registry } = this.requireState();
    return {
      maxFloor: fleet.maxFloor,
      cars: fleet.snapshot(),
      floors: registry.snapshot(),
    };
  }

  getMetrics(): DispatcherMetrics {
    const pending = this.state
      ? this.state.registry.callsFor('up').length + this.state.registry.callsFor('down').length
      : 0;
    return {
      ...this.metrics,
      callsPending: pending,
      totalEnergy: this.deps.energyTracker.getTotalEnergy(),
    };
  }

  getEnergyStatus(carId: CarId): EnergyStatus {
    this.requireState().fleet.get(carId);
    return this.deps.energyTracker.getEnergyStatus(carId);
  }

  on(handler: DispatchNotificationHandler): void {
    this.eventHandlers.add(handler);
  }

  off(handler: DispatchNotificationHandler): void {
    this.eventHandlers.delete(handler);
  }

  // ==========================================================================
  // Event Handlers
  // ==========================================================================

  private handleCall(floor: number, direction: CallDirection): MoveCommand[] {
    const { fleet, registry } = this.requireState();
    const isNew = registry.addCall(floor, direction);

    if (isNew) {
      this.metrics.callsRegistered++;
      if (this.currentTick !== undefined) {
        this.callRegisteredAt.set(callKey(floor, direction), this.currentTick);
      }
    }
    debug.callRegistered(floor, direction, isNew);
    this.emitEvent({
      type: 'call_registered',
      timestamp: Date.now(),
      tick: this.currentTick,
      floor,
      data: { direction, isNew },
    });

    // A repeated call that some car already intends to serve changes nothing.
    if (!isNew && this.claimedFloors().has(floor)) {
      this.debug('Duplicate call already claimed:', floor, direction);
      return [];
    }

    const scanning = fleet.all().filter((car) => car.lifecycleState === 'scanning');
    const [best] = this.deps.scorer.rank(scanning, floor, direction);
    if (best) {
      const car = fleet.get(best.carId);
      car.targetFloors.add(floor);
      this.debug('Call on the way for car', car.id, 'at', floor, direction, `(score ${best.score})`);
      this.announceAssignment(car, floor, direction, best.score, 'on_the_way');
      return this.replan(car);
    }

    const resting = this.bestRestingCar(fleet.all(), floor, direction);
    if (resting) {
      this.debug('Waking resting car', resting.car.id, 'for', floor, direction, `(score ${resting.score})`);
      return this.wake(resting.car, floor, direction, resting.score, 'wake');
    }

    this.debug('No car available, call left pending:', floor, direction);
    debug.callPending(floor, direction);
    this.emitEvent({
      type: 'call_pending',
      timestamp: Date.now(),
      tick: this.currentTick,
      floor,
      data: { direction },
    });
    return [];
  }

  private handleStopped(car: CarState, floor: number): MoveCommand[] {
    const { registry } = this.requireState();
    assertFloor(floor, registry.maxFloor);

    this.moveTo(car, floor);
    car.commandedFloor = undefined;
    const arrival = car.direction;
    this.setState(car, 'loading');

    car.targetFloors.delete(floor);
    this.restoreOnboardTargets(car);

    const plan = this.deps.planner.plan(car);
    const turnaround: CallDirection | null = arrival === 'none' ? null : opposite(arrival);
    if (arrival === 'none') {
      this.clearCall(car, floor, 'up');
      this.clearCall(car, floor, 'down');
    } else {
      this.clearCall(car, floor, arrival);
    }

    if (plan.state === 'scanning') {
      if (turnaround && plan.reversed) {
        this.clearCall(car, floor, turnaround);
      }
      return this.replan(car);
    }

    // The opposite call here is served only if the car rests here or leaves that way.
    const claimed = this.selfDispatch(car, floor);
    if (claimed) {
      const [command] = claimed;
      if (turnaround && command && directionToward(floor, command.targetFloor) === turnaround) {
        this.clearCall(car, floor, turnaround);
      }
      return claimed;
    }

    if (turnaround) {
      this.clearCall(car, floor, turnaround);
    }
    this.rest(car);
    return [];
  }

  private handleBoard(car: CarState, passengerId: PassengerId, destination: number): MoveCommand[] {
    assertFloor(destination, this.requireState().registry.maxFloor);

    if (!car.onboard.has(passengerId) && isFull(car)) {
      throw new CapacityExceededError(car.id, car.capacity);
    }

    car.onboard.set(passengerId, destination);
    if (destination !== car.currentFloor) {
      car.targetFloors.add(destination);
    }
    this.debug('Passenger', passengerId, 'boarded car', car.id, '->', destination);

    if (car.targetFloors.size === 0) {
      return [];
    }
    return this.replan(car);
  }

  private handleAlight(car: CarState, passengerId: PassengerId, floor: number): MoveCommand[] {
    assertFloor(floor, this.requireState().registry.maxFloor);
    this.moveTo(car, floor);

    // Target floors are only cleared by the stop itself.
    if (car.onboard.delete(passengerId)) {
      this.debug('Passenger', passengerId, 'left car', car.id, 'at', floor);
    }
    return [];
  }

  private handleIdle(car: CarState): MoveCommand[] {
    const pending = this.requireState().registry.pendingFloors();
    for (const floor of [...car.targetFloors]) {
      if (!pending.has(floor)) {
        car.targetFloors.delete(floor);
      }
    }
    this.restoreOnboardTargets(car);

    if (car.targetFloors.size > 0) {
      if (car.commandedFloor !== undefined && car.targetFloors.has(car.commandedFloor)) {
        return [];
      }
      return this.replan(car);
    }

    const claimed = this.selfDispatch(car);
    if (claimed) {
      return claimed;
    }

    this.rest(car);
    return this.driftHome(car);
  }

  private handlePassing(car: CarState, floor: number): MoveCommand[] {
    assertFloor(floor, this.requireState().registry.maxFloor);
    this.moveTo(car, floor);
    return [];
  }

  // ==========================================================================
  // Decisions
  // ==========================================================================

  /**
   * Ask the planner for the next stop and command it if it changed.
   */
  private replan(car: CarState): MoveCommand[] {
    const previousState = car.lifecycleState;
    const previousDirection = car.direction;
    const plan = this.deps.planner.nextStop(car);

    if (previousState !== car.lifecycleState) {
      this.announceStateChange(car, previousState);
    }
    if (plan.reversed) {
      this.metrics.directionReversals++;
      debug.directionReversed(car.id, previousDirection, car.direction, car.currentFloor);
      this.emitEvent({
        type: 'direction_reversed',
        timestamp: Date.now(),
        tick: this.currentTick,
        carId: car.id,
        floor: car.currentFloor,
        data: { from: previousDirection, to: car.direction },
      });
    }

    if (plan.nextFloor === null) {
      this.rest(car);
      return [];
    }
    if (car.commandedFloor === plan.nextFloor) {
      return [];
    }
    return [this.issueMove(car, plan.nextFloor)];
  }

  /**
   * Send a car that has nothing to do to a specific call.
   */
  private wake(
    car: CarState,
    floor: number,
    direction: CallDirection,
    score: number,
    via: 'wake' | 'self_dispatch'
  ): MoveCommand[] {
    const wasResting = car.lifecycleState === 'resting';
    // Direction is the one the call is served in, not the way to the call
    // floor: a car woken for an up call below it travels down marked 'up'.
    car.direction = direction;
    car.targetFloors.add(floor);
    this.setState(car, 'scanning');

    if (wasResting) {
      this.emitEvent({
        type: 'car_woken',
        timestamp: Date.now(),
        tick: this.currentTick,
        carId: car.id,
        floor,
        data: { direction, via },
      });
    }
    this.announceAssignment(car, floor, direction, score, via);

    if (car.commandedFloor === floor) {
      return [];
    }
    return [this.issueMove(car, floor)];
  }

  /**
   * Pick the best pending call nobody has claimed and wake the car for it.
   * Calls at `skipFloor` are left to the stop being handled there.
   */
  private selfDispatch(car: CarState, skipFloor?: number): MoveCommand[] | null {
    const { registry } = this.requireState();
    if (!registry.hasAny() || isFull(car)) {
      return null;
    }

    const claimed = this.claimedFloors();
    const choices: PendingCallChoice[] = [];
    for (const direction of CALL_DIRECTIONS) {
      for (const floor of registry.callsFor(direction)) {
        if (!claimed.has(floor) && floor !== skipFloor) {
          choices.push({ floor, direction, score: this.deps.scorer.affinity(car, floor) });
        }
      }
    }

    choices.sort((a, b) =>
      b.score - a.score
      || a.floor - b.floor
      || CALL_DIRECTIONS.indexOf(a.direction) - CALL_DIRECTIONS.indexOf(b.direction)
    );
    const [choice] = choices;
    if (!choice) {
      return null;
    }

    this.debug('Car', car.id, 'self-dispatched to pending call', choice.floor, choice.direction);
    return this.wake(car, choice.floor, choice.direction, choice.score, 'self_dispatch');
  }

  private bestRestingCar(
    cars: CarState[],
    floor: number,
    direction: CallDirection
  ): { car: CarState; score: number } | null {
    let best: { car: CarState; score: number } | null = null;
    for (const car of cars) {
      if (car.lifecycleState !== 'resting' || isFull(car)) {
        continue;
      }
      // Scores order resting cars only; a distant car is still woken.
      const score = this.deps.scorer.score(car, floor, direction);
      if (!best || score > best.score) {
        best = { car, score };
      }
    }
    return best;
  }

  private rest(car: CarState): void {
    car.direction = 'none';
    car.restFloor = car.currentFloor;
    const previous = car.lifecycleState;
    this.setState(car, 'resting');

    if (previous !== 'resting') {
      // A resting car holds no outstanding command.
      car.commandedFloor = undefined;
      this.debug('Car', car.id, 'resting at', car.currentFloor);
      this.emitEvent({
        type: 'car_resting',
        timestamp: Date.now(),
        tick: this.currentTick,
        carId: car.id,
        floor: car.currentFloor,
      });
    }
  }

  private driftHome(car: CarState): MoveCommand[] {
    if (!this.config.driftEnabled) {
      return [];
    }

    const center = zoneCenter(car.homeZone);
    if (Math.abs(car.currentFloor - center) <= this.config.driftThreshold) {
      return [];
    }
    if (car.commandedFloor === center) {
      return [];
    }

    this.debug('Car', car.id, 'drifting home from', car.currentFloor, 'to', center);
    return [this.issueMove(car, center)];
  }

  // ==========================================================================
  // State Helpers
  // ==========================================================================

  private requireState(): FleetState {
    if (!this.state) {
      throw ConfigurationError.fleetNotInitialized();
    }
    return this.state;
  }

  private claimedFloors(): Set<number> {
    const claimed = new Set<number>();
    for (const car of this.requireState().fleet.all()) {
      for (const floor of car.targetFloors) {
        claimed.add(floor);
      }
    }
    return claimed;
  }

  private restoreOnboardTargets(car: CarState): void {
    for (const destination of car.onboard.values()) {
      if (destination !== car.currentFloor) {
        car.targetFloors.add(destination);
      }
    }
  }

  private setState(car: CarState, next: CarLifecycleState): void {
    const previous = car.lifecycleState;
    if (previous === next) {
      return;
    }
    car.lifecycleState = next;
    this.announceStateChange(car, previous);
  }

  private moveTo(car: CarState, floor: number): void {
    if (car.currentFloor === floor) {
      return;
    }

    const usage = this.deps.energyTracker.recordTravel(car.id, car.currentFloor, floor);
    car.currentFloor = floor;

    if (usage.escalatedFrom !== undefined) {
      const exceeded = usage.status.warningLevel === 'exceeded';
      this.debug('Energy', usage.status.warningLevel, 'for car', car.id, `(${usage.status.spent})`);
      this.emitEvent({
        type: exceeded ? 'energy_exceeded' : 'energy_warning',
        timestamp: Date.now(),
        tick: this.currentTick,
        carId: car.id,
        data: {
          level: usage.status.warningLevel,
          spent: usage.status.spent,
          limit: usage.status.limit,
        },
      });
    }
  }

  private clearCall(car: CarState, floor: number, direction: CallDirection): void {
    const { registry } = this.requireState();
    if (!registry.clearCall(floor, direction)) {
      return;
    }

    this.metrics.callsCleared++;
    const key = callKey(floor, direction);
    const registeredAt = this.callRegisteredAt.get(key);
    this.callRegisteredAt.delete(key);
    if (registeredAt !== undefined && this.currentTick !== undefined) {
      this.recordWait(this.currentTick - registeredAt);
    }

    debug.callCleared(floor, direction, car.id);
    this.emitEvent({
      type: 'call_cleared',
      timestamp: Date.now(),
      tick: this.currentTick,
      carId: car.id,
      floor,
      data: { direction },
    });
  }

  private issueMove(car: CarState, targetFloor: number, immediate = false): MoveCommand {
    car.commandedFloor = immediate ? undefined : targetFloor;
    this.metrics.movesIssued++;

    debug.moveIssued(car.id, targetFloor, immediate);
    this.emitEvent({
      type: 'move_issued',
      timestamp: Date.now(),
      tick: this.currentTick,
      carId: car.id,
      floor: targetFloor,
      data: { immediate },
    });

    return { carId: car.id, targetFloor, immediate };
  }

  private recordWait(wait: number): void {
    this.measuredWaits++;
    // Running average
    this.metrics.averageCallWaitTicks =
      (this.metrics.averageCallWaitTicks * (this.measuredWaits - 1) + wait) / this.measuredWaits;
    this.metrics.maxCallWaitTicks = Math.max(this.metrics.maxCallWaitTicks, wait);
  }

  private announceStateChange(car: CarState, previous: CarLifecycleState): void {
    debug.carStateChanged(car.id, previous, car.lifecycleState);
    this.emitEvent({
      type: 'car_state_changed',
      timestamp: Date.now(),
      tick: this.currentTick,
      carId: car.id,
      floor: car.currentFloor,
      data: { from: previous, to: car.lifecycleState },
    });
  }

  private announceAssignment(
    car: CarState,
    floor: number,
    direction: CallDirection,
    score: number,
    via: 'on_the_way' | 'wake' | 'self_dispatch'
  ): void {
    debug.callAssigned(floor, direction, car.id, score, via);
    this.emitEvent({
      type: 'call_assigned',
      timestamp: Date.now(),
      tick: this.currentTick,
      carId: car.id,
      floor,
      data: { direction, score, via },
    });
  }

  /**
   * Emit a notification to all handlers
   */
  private emitEvent(notification: DispatchNotification): void {
    for (const handler of this.eventHandlers) {
      try {
        const result = handler(notification);
        if (result instanceof Promise) {
          result.catch((error) => {
            this.debug('Notification handler error:', error);
          });
        }
      } catch (error) {
        this.debug('Notification handler error:', error);
      }
    }
  }

  /**
   * Debug logging
   */
  private debug(...args: unknown[]): void {
    if (this.config.debug) {
      console.log('[Dispatcher]', ...args);
    }
  }
}

function callKey(floor: number, direction: CallDirection): string {
  return `${floor}:${direction}`;
}
