/**
 * Debug instrumentation API.
 *
 * Lets the dispatcher emit a trace of every decision it makes. Nothing
 * is emitted until the emitter is enabled, and listeners run after the
 * decision is committed.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debugEmitter.onDebug((event) => console.log(event.type, event.data));
 *
 * debug.setContext({ carId: 1, tick: 42 });
 * debug.moveIssued(1, 5, false);
 * debug.clearContext();
 * ```
 */

export { debugEmitter, matchesFilter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugContext, EventFilter } from './types.js';
