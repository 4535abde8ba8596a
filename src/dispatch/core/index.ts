/**
 * Dispatcher Core Module
 */

export type {
  DispatcherConfig,
  DispatcherOptions,
  DispatcherDependencies,
  DispatcherMetrics,
  IDispatcher,
} from './types.js';
export { Dispatcher } from './dispatcher.js';
