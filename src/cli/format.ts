/**
 * Plain-text rendering for CLI output. Colour is applied by the commands.
 */

import type { CarSnapshot, DispatchInput, FloorZone, MoveCommand } from '../dispatch/types.js';

export function formatEvent(event: DispatchInput): string {
  switch (event.type) {
    case 'call':
      return `call ${event.floor} ${event.direction}`;
    case 'stopped':
      return `car ${event.carId} stopped @ ${event.floor}`;
    case 'board':
      return `car ${event.carId} board p${event.passengerId} -> ${event.destination}`;
    case 'alight':
      return `car ${event.carId} alight p${event.passengerId} @ ${event.floor}`;
    case 'idle':
      return `car ${event.carId} idle`;
    case 'passing':
      return `car ${event.carId} passing ${event.floor}`;
  }
}

export function formatCommand(command: MoveCommand): string {
  const suffix = command.immediate ? ' (immediate)' : '';
  return `car ${command.carId} -> ${command.targetFloor}${suffix}`;
}

export function formatZone(zone: FloorZone): string {
  return `${zone.low}-${zone.high}`;
}

export function formatCar(car: CarSnapshot): string {
  const targets = car.targetFloors.length > 0 ? car.targetFloors.join(',') : '-';
  return [
    `car ${car.id}`,
    `floor ${car.currentFloor}`,
    car.lifecycleState,
    car.direction,
    `targets ${targets}`,
    `onboard ${car.onboard.length}/${car.capacity}`,
  ].join('  ');
}
