/**
 * Convenient debug API for instrumentation.
 * Provides typed methods for emitting dispatch debug events.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext } from './types.js';

/**
 * Debug API object with convenience methods for common event types.
 */
export const debug = {
  // ========== State Management ==========

  get enabled(): boolean {
    return debugEmitter.isEnabled();
  },

  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  getContext(): DebugContext {
    return debugEmitter.getContext();
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // ========== Call Events ==========

  callRegistered(floor: number, direction: string, isNew: boolean): void {
    debugEmitter.emitDebug('call.registered', 'dispatcher', { floor, direction, isNew });
  },

  callAssigned(floor: number, direction: string, carId: number, score: number, via: 'on_the_way' | 'wake' | 'self_dispatch'): void {
    debugEmitter.emitDebug('call.assigned', 'dispatcher', { floor, direction, carId, score, via });
  },

  callPending(floor: number, direction: string): void {
    debugEmitter.emitDebug('call.pending', 'dispatcher', { floor, direction });
  },

  callCleared(floor: number, direction: string, carId: number): void {
    debugEmitter.emitDebug('call.cleared', 'dispatcher', { floor, direction, carId });
  },

  // ========== Car Events ==========

  /**
   * Emit car.state_changed event.
   */
  carStateChanged(carId: number, from: string, to: string): void {
    debugEmitter.emitDebug('car.state_changed', 'state-machine', { carId, from, to });
  },

  /**
   * Emit car.direction_reversed event.
   */
  directionReversed(carId: number, from: string, to: string, floor: number): void {
    debugEmitter.emitDebug('car.direction_reversed', 'scan-planner', { carId, from, to, floor });
  },

  moveIssued(carId: number, targetFloor: number, immediate: boolean): void {
    debugEmitter.emitDebug('car.move_issued', 'dispatcher', { carId, targetFloor, immediate });
  },

  // ========== System Events ==========

  fleetInitialized(config: Record<string, unknown>): void {
    debugEmitter.emitDebug('system.fleet_initialized', 'dispatcher', config);
  },

  /**
   * Emit system.error event.
   */
  systemError(source: string, error: unknown): void {
    debugEmitter.emitDebug('system.error', source, { error: serializeError(error) });
  },

  // ========== Generic Events ==========

  custom(type: string, source: string, data: Record<string, unknown>): void {
    debugEmitter.emitDebug(type, source, data);
  },
};

/**
 * Serialize an error object for safe JSON transmission.
 */
function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === 'object' && error !== null) {
    return Object.fromEntries(Object.entries(error));
  }
  return { message: String(error) };
}
