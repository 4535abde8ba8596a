/**
 * Floor Request Registry Types
 */

import type { CallDirection, FloorCallState } from '../types.js';

export interface IFloorRequestRegistry {
  /** Highest floor index served */
  readonly maxFloor: number;

  /** Register a hall call; returns false when it was already pending */
  addCall(floor: number, direction: CallDirection): boolean;

  /** Clear a hall call; returns false when nothing was pending */
  clearCall(floor: number, direction: CallDirection): boolean;

  /** Check a single call flag */
  hasCall(floor: number, direction: CallDirection): boolean;

  /** All floors with any pending call */
  pendingFloors(): Set<number>;

  /** Pending floors for one direction, ascending */
  callsFor(direction: CallDirection): number[];

  /** Whether any call is pending anywhere in the building */
  hasAny(): boolean;

  /** Per-floor call flags for every floor */
  snapshot(): FloorCallState[];
}
