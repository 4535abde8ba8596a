/**
 * Trace event shapes.
 */

export interface DebugEvent {
  /** Position in the emitter's stream, starting at 1 */
  seq: number;
  timestamp: number;
  /** "domain.action", e.g. "call.assigned" or "car.state_changed" */
  type: string;
  /** Emitting module, e.g. "dispatcher" or "replay" */
  source: string;
  data: Record<string, unknown>;
  carId?: number;
  tick?: number;
}

/**
 * Car and tick stamped on every event emitted while set.
 */
export interface DebugContext {
  carId?: number;
  tick?: number;
}

export interface EventFilter {
  /** Type prefix, so "call" matches every call.* event */
  type?: string;
  source?: string;
  carId?: number;
  /** Only events stamped with this tick or a later one */
  sinceTick?: number;
}
