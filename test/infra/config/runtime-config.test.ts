import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_RUNTIME_CONFIG,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  toDispatcherOptions,
  validateRuntimeConfig,
} from '../../../src/infra/config/runtime-config.js';
import { ConfigurationError } from '../../../src/dispatch/errors.js';
import { DEFAULT_SCORING_POLICY } from '../../../src/dispatch/scorer/scoring-policy.js';

describe('runtime-config', () => {
  let configDir: string;
  let env: NodeJS.ProcessEnv;

  const writeConfig = (content: unknown) => {
    const text = typeof content === 'string' ? content : JSON.stringify(content);
    fs.writeFileSync(path.join(configDir, 'dispatch.json'), text);
  };

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lift-runtime-config-'));
    env = { LIFT_DISPATCH_CONFIG_DIR: configDir };
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  it('should place dispatch.json in the config dir', () => {
    expect(getRuntimeConfigPath(env)).toBe(path.join(configDir, 'dispatch.json'));
  });

  it('should use defaults when there is no file', () => {
    expect(loadRuntimeConfig(env)).toEqual(DEFAULT_RUNTIME_CONFIG);
  });

  it('should merge the file over the defaults', () => {
    writeConfig({
      dispatch: { zoneOverlap: 0.1 },
      scoring: { zoneBonus: 20 },
      energy: { carWeights: { '1': 2 } },
    });

    const config = loadRuntimeConfig(env);

    expect(config.dispatch).toEqual({ zoneOverlap: 0.1, driftEnabled: true, driftThreshold: 2 });
    expect(config.scoring).toEqual({ ...DEFAULT_SCORING_POLICY, zoneBonus: 20 });
    expect(config.energy.carWeights).toEqual({ '1': 2 });
    expect(config.energy.warningThreshold).toBe(0.7);
  });

  it('should apply environment overrides last', () => {
    writeConfig({ dispatch: { zoneOverlap: 0.1, driftThreshold: 3 } });

    const config = loadRuntimeConfig({
      ...env,
      LIFT_DISPATCH_ZONE_OVERLAP: '0.25',
      LIFT_DISPATCH_DRIFT_THRESHOLD: '4',
      LIFT_DISPATCH_ENERGY_BUDGET: '50',
      LIFT_DISPATCH_DEBUG: '1',
    });

    expect(config.dispatch.zoneOverlap).toBe(0.25);
    expect(config.dispatch.driftThreshold).toBe(4);
    expect(config.energy.budgetPerCar).toBe(50);
    expect(config.debug.loggingEnabled).toBe(true);
  });

  it('should let LIFT_DISPATCH_DEBUG switch file-enabled logging off', () => {
    writeConfig({ debug: { loggingEnabled: true } });

    expect(loadRuntimeConfig(env).debug.loggingEnabled).toBe(true);
    expect(loadRuntimeConfig({ ...env, LIFT_DISPATCH_DEBUG: '0' }).debug.loggingEnabled).toBe(false);
  });

  it('should ignore environment values that do not parse', () => {
    const config = loadRuntimeConfig({
      ...env,
      LIFT_DISPATCH_ZONE_OVERLAP: '3',
      LIFT_DISPATCH_DRIFT_THRESHOLD: 'far',
      LIFT_DISPATCH_ENERGY_BUDGET: '-5',
    });

    expect(config.dispatch.zoneOverlap).toBe(0);
    expect(config.dispatch.driftThreshold).toBe(2);
    expect(config.energy.budgetPerCar).toBeUndefined();
  });

  it('should reject values outside the schema', () => {
    writeConfig({ dispatch: { zoneOverlap: 2 } });

    expect(() => loadRuntimeConfig(env)).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig(env)).toThrow(
      'Invalid dispatcher configuration: dispatch.json: /dispatch/zoneOverlap: must be <= 1'
    );
  });

  it('should reject unknown keys', () => {
    expect(() => validateRuntimeConfig({ lanes: 3 })).toThrow('/: must NOT have additional properties');
  });

  it('should reject a file that is not JSON', () => {
    writeConfig('{ "dispatch": ');

    expect(() => loadRuntimeConfig(env)).toThrow(/dispatch\.json is not valid JSON/);
  });

  it('should translate to dispatcher options', () => {
    writeConfig({
      dispatch: { zoneOverlap: 0.1 },
      energy: { budgetPerCar: 40, carWeights: { '1': 2 } },
    });

    expect(toDispatcherOptions(loadRuntimeConfig(env))).toEqual({
      debug: false,
      scoring: DEFAULT_SCORING_POLICY,
      zoneOverlap: 0.1,
      driftEnabled: true,
      driftThreshold: 2,
      energy: {
        budgetPerCar: 40,
        thresholds: { warningThreshold: 0.7, criticalThreshold: 0.9 },
        carWeights: { 1: 2 },
      },
    });
  });
});
