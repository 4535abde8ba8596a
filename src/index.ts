/**
 * lift-dispatch
 *
 * Group dispatch core for a bank of elevator cars, plus the config,
 * replay and instrumentation layers around it.
 */

export * from './dispatch/index.js';

export {
  loadEventScript,
  validateEventScript,
  runScript,
  EVENT_SCRIPT_SCHEMA,
} from './replay/index.js';
export type {
  EventScript,
  ReplayStep,
  ReplayStepError,
  ReplayOptions,
  ReplayResult,
} from './replay/index.js';

export {
  DEFAULT_RUNTIME_CONFIG,
  getConfigDir,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  toDispatcherOptions,
} from './infra/config/index.js';
export type { LiftDispatchRuntimeConfig } from './infra/config/index.js';

export { debug, debugEmitter } from './debug/index.js';
export type { DebugEvent, DebugContext, EventFilter } from './debug/index.js';
