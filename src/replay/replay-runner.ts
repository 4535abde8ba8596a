/**
 * Replay Runner
 *
 * Feeds an event script through a fresh Dispatcher and records the
 * commands each event produced.
 */

import { Dispatcher } from '../dispatch/core/index.js';
import { isDispatchError } from '../dispatch/errors.js';
import { debug } from '../debug/index.js';
import type { EventScript, ReplayOptions, ReplayResult, ReplayStep } from './types.js';

export function runScript(script: EventScript, options: ReplayOptions = {}): ReplayResult {
  const dispatcher = new Dispatcher(options.dispatcher);
  const initialCommands = dispatcher.initFleet({ floors: script.floors, cars: script.cars });

  const steps: ReplayStep[] = [];
  let completed = true;

  for (const [index, event] of script.events.entries()) {
    try {
      steps.push({ index, event, commands: dispatcher.handle(event) });
    } catch (error) {
      if (!isDispatchError(error)) {
        throw error;
      }
      debug.systemError('replay', error);
      steps.push({
        index,
        event,
        commands: [],
        error: { code: error.code, name: error.name, message: error.message },
      });
      if (options.stopOnError) {
        completed = false;
        break;
      }
    }
  }

  return {
    name: script.name,
    initialCommands,
    steps,
    completed,
    snapshot: dispatcher.getFleetSnapshot(),
    metrics: dispatcher.getMetrics(),
  };
}
