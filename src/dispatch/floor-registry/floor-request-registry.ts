/**
 * Floor Request Registry
 *
 * Outstanding hall calls per floor and direction. Floors outside
 * [0, maxFloor] are rejected with InvalidFloorError rather than clamped.
 */

import type { CallDirection, FloorCallState } from '../types.js';
import type { IFloorRequestRegistry } from './types.js';
import { assertFloor } from '../errors.js';

export class FloorRequestRegistry implements IFloorRequestRegistry {
  readonly maxFloor: number;
  private calls: Record<CallDirection, Set<number>> = {
    up: new Set(),
    down: new Set(),
  };

  constructor(maxFloor: number) {
    this.maxFloor = maxFloor;
  }

  addCall(floor: number, direction: CallDirection): boolean {
    assertFloor(floor, this.maxFloor);
    const pending = this.calls[direction];
    if (pending.has(floor)) {
      return false;
    }
    pending.add(floor);
    return true;
  }

  clearCall(floor: number, direction: CallDirection): boolean {
    assertFloor(floor, this.maxFloor);
    return this.calls[direction].delete(floor);
  }

  hasCall(floor: number, direction: CallDirection): boolean {
    return this.calls[direction].has(floor);
  }

  pendingFloors(): Set<number> {
    return new Set([...this.calls.up, ...this.calls.down]);
  }

  callsFor(direction: CallDirection): number[] {
    return [...this.calls[direction]].sort((a, b) => a - b);
  }

  hasAny(): boolean {
    return this.calls.up.size > 0 || this.calls.down.size > 0;
  }

  snapshot(): FloorCallState[] {
    const floors: FloorCallState[] = [];
    for (let floor = 0; floor <= this.maxFloor; floor++) {
      floors.push({
        floor,
        hasUpCall: this.calls.up.has(floor),
        hasDownCall: this.calls.down.has(floor),
      });
    }
    return floors;
  }
}
