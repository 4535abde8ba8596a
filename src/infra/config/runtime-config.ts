import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import { getConfigDir } from './config-paths.js';
import { debugLoggingOverride } from './debug-flags.js';
import { ConfigurationError } from '../../dispatch/errors.js';
import { DEFAULT_SCORING_POLICY } from '../../dispatch/scorer/index.js';
import type { ScoringPolicy } from '../../dispatch/scorer/index.js';
import type { DispatcherOptions } from '../../dispatch/core/index.js';

export interface LiftDispatchRuntimeConfig {
  $schema?: string;
  dispatch: {
    zoneOverlap: number;
    driftEnabled: boolean;
    driftThreshold: number;
  };
  scoring: ScoringPolicy;
  energy: {
    budgetPerCar?: number;
    warningThreshold: number;
    criticalThreshold: number;
    /** Energy per floor keyed by car id */
    carWeights: Record<string, number>;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

/**
 * Shape of dispatch.json on disk: every section and key is optional.
 */
export interface RuntimeConfigFile {
  $schema?: string;
  dispatch?: Partial<LiftDispatchRuntimeConfig['dispatch']>;
  scoring?: Partial<ScoringPolicy>;
  energy?: Partial<LiftDispatchRuntimeConfig['energy']>;
  debug?: Partial<LiftDispatchRuntimeConfig['debug']>;
}

export interface RuntimeConfigIssue {
  path: string;
  message: string;
}

export const DEFAULT_RUNTIME_CONFIG: LiftDispatchRuntimeConfig = {
  $schema: './dispatch.schema.json',
  dispatch: {
    zoneOverlap: 0,
    driftEnabled: true,
    driftThreshold: 2,
  },
  scoring: { ...DEFAULT_SCORING_POLICY },
  energy: {
    budgetPerCar: undefined,
    warningThreshold: 0.7,
    criticalThreshold: 0.9,
    carWeights: {},
  },
  debug: {
    loggingEnabled: false,
  },
};

const fraction = { type: 'number', minimum: 0, maximum: 1 };
const nonNegative = { type: 'number', minimum: 0 };

export const RUNTIME_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Lift Dispatch Runtime Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    dispatch: {
      type: 'object',
      properties: {
        zoneOverlap: fraction,
        driftEnabled: { type: 'boolean' },
        driftThreshold: { type: 'integer', minimum: 0 },
      },
      additionalProperties: false,
    },
    scoring: {
      type: 'object',
      properties: {
        restingBase: nonNegative,
        restingDistanceWeight: nonNegative,
        zoneBonus: nonNegative,
        scanningBase: nonNegative,
        scanningDistanceWeight: nonNegative,
        loadPenalty: fraction,
      },
      additionalProperties: false,
    },
    energy: {
      type: 'object',
      properties: {
        budgetPerCar: { type: 'number', exclusiveMinimum: 0 },
        warningThreshold: fraction,
        criticalThreshold: fraction,
        carWeights: {
          type: 'object',
          propertyNames: { pattern: '^[0-9]+$' },
          additionalProperties: nonNegative,
        },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export function getRuntimeConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'dispatch.json');
}

function toNonNegativeInt(value: string | undefined, fallback: number): number {
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed >= 0) {
      return parsed;
    }
  }
  return fallback;
}

function toFraction(value: string | undefined, fallback: number): number {
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed >= 0 && parsed <= 1) {
      return parsed;
    }
  }
  return fallback;
}

function toPositiveNumber(value: string | undefined, fallback: number | undefined): number | undefined {
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return fallback;
}

function createValidator() {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return ajv.compile<RuntimeConfigFile>(RUNTIME_CONFIG_SCHEMA);
}

/**
 * Validate a parsed dispatch.json against the runtime schema
 */
export function validateRuntimeConfig(value: unknown): RuntimeConfigFile {
  const validate = createValidator();
  if (validate(value)) {
    return value;
  }

  const issues: RuntimeConfigIssue[] = (validate.errors || []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message || 'Unknown validation error',
  }));
  throw new ConfigurationError(
    `dispatch.json: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
    issues
  );
}

/**
 * Read dispatch.json, or null when there is none
 */
export function loadRuntimeConfigFile(env: NodeJS.ProcessEnv = process.env): RuntimeConfigFile | null {
  const configPath = getRuntimeConfigPath(env);
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`dispatch.json is not valid JSON (${reason})`, { path: configPath });
  }
  return validateRuntimeConfig(parsed);
}

export function mergeRuntimeConfig(
  base: LiftDispatchRuntimeConfig,
  file: RuntimeConfigFile | null
): LiftDispatchRuntimeConfig {
  if (!file) {
    return base;
  }
  return {
    $schema: base.$schema,
    dispatch: { ...base.dispatch, ...file.dispatch },
    scoring: { ...base.scoring, ...file.scoring },
    energy: {
      ...base.energy,
      ...file.energy,
      carWeights: { ...base.energy.carWeights, ...file.energy?.carWeights },
    },
    debug: { ...base.debug, ...file.debug },
  };
}

export function applyEnvironmentOverrides(
  config: LiftDispatchRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): LiftDispatchRuntimeConfig {
  return {
    ...config,
    dispatch: {
      ...config.dispatch,
      zoneOverlap: toFraction(env.LIFT_DISPATCH_ZONE_OVERLAP, config.dispatch.zoneOverlap),
      driftThreshold: toNonNegativeInt(env.LIFT_DISPATCH_DRIFT_THRESHOLD, config.dispatch.driftThreshold),
    },
    energy: {
      ...config.energy,
      budgetPerCar: toPositiveNumber(env.LIFT_DISPATCH_ENERGY_BUDGET, config.energy.budgetPerCar),
    },
    debug: {
      loggingEnabled: debugLoggingOverride(env) ?? config.debug.loggingEnabled,
    },
  };
}

/**
 * Defaults, then dispatch.json, then environment overrides.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): LiftDispatchRuntimeConfig {
  const merged = mergeRuntimeConfig(DEFAULT_RUNTIME_CONFIG, loadRuntimeConfigFile(env));
  return applyEnvironmentOverrides(merged, env);
}

export function toDispatcherOptions(config: LiftDispatchRuntimeConfig): DispatcherOptions {
  const carWeights: Record<number, number> = {};
  for (const [carId, weight] of Object.entries(config.energy.carWeights)) {
    carWeights[Number(carId)] = weight;
  }

  return {
    debug: config.debug.loggingEnabled,
    scoring: { ...config.scoring },
    zoneOverlap: config.dispatch.zoneOverlap,
    driftEnabled: config.dispatch.driftEnabled,
    driftThreshold: config.dispatch.driftThreshold,
    energy: {
      budgetPerCar: config.energy.budgetPerCar,
      thresholds: {
        warningThreshold: config.energy.warningThreshold,
        criticalThreshold: config.energy.criticalThreshold,
      },
      carWeights,
    },
  };
}
