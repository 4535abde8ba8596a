/**
 * Replay Module
 */

export type {
  EventScript,
  ReplayStep,
  ReplayStepError,
  ReplayOptions,
  ReplayResult,
} from './types.js';
export { EVENT_SCRIPT_SCHEMA, validateEventScript, loadEventScript } from './script-loader.js';
export { runScript } from './replay-runner.js';
