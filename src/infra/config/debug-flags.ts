const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

/**
 * LIFT_DISPATCH_DEBUG forces dispatcher logging on ('1') or off (anything
 * else). Unset leaves the runtime config in charge.
 */
export function debugLoggingOverride(env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  if (env.LIFT_DISPATCH_DEBUG === undefined) {
    return undefined;
  }
  return env.LIFT_DISPATCH_DEBUG === '1';
}

/**
 * Instrumentation events are traced when LIFT_DISPATCH_TRACE is truthy.
 */
export function isTraceEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthy(env.LIFT_DISPATCH_TRACE);
}
