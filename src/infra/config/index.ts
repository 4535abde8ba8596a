/**
 * Configuration module exports
 */
export { getConfigDir, ensureConfigDir } from './config-paths.js';

export {
  type LiftDispatchRuntimeConfig,
  type RuntimeConfigFile,
  type RuntimeConfigIssue,
  DEFAULT_RUNTIME_CONFIG,
  RUNTIME_CONFIG_SCHEMA,
  getRuntimeConfigPath,
  validateRuntimeConfig,
  loadRuntimeConfigFile,
  mergeRuntimeConfig,
  applyEnvironmentOverrides,
  loadRuntimeConfig,
  toDispatcherOptions,
} from './runtime-config.js';

export { debugLoggingOverride, isTraceEnabled } from './debug-flags.js';
