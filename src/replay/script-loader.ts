/**
 * Event Script Loader
 *
 * Reads and validates replay scripts. Structural checks happen here;
 * fleet rules (duplicate ids, floor ranges) are left to the dispatcher.
 */

import * as fs from 'fs';
import Ajv2020 from 'ajv/dist/2020.js';
import { ConfigurationError } from '../dispatch/errors.js';
import type { EventScript } from './types.js';

const floor = { type: 'integer' };
const carId = { type: 'integer', minimum: 0 };
const tick = { type: 'integer', minimum: 0 };

function eventSchema(type: string, properties: Record<string, object>): object {
  return {
    type: 'object',
    properties: {
      type: { const: type },
      tick,
      ...properties,
    },
    required: ['type', ...Object.keys(properties)],
    additionalProperties: false,
  };
}

export const EVENT_SCRIPT_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Lift Dispatch Event Script',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    name: { type: 'string' },
    floors: { type: 'integer', minimum: 1 },
    cars: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          id: carId,
          capacity: { type: 'integer', minimum: 1 },
        },
        required: ['id', 'capacity'],
        additionalProperties: false,
      },
    },
    events: {
      type: 'array',
      items: {
        oneOf: [
          eventSchema('call', { floor, direction: { enum: ['up', 'down'] } }),
          eventSchema('stopped', { carId, floor }),
          eventSchema('board', { carId, passengerId: { type: 'integer' }, destination: floor }),
          eventSchema('alight', { carId, passengerId: { type: 'integer' }, floor }),
          eventSchema('idle', { carId }),
          eventSchema('passing', { carId, floor }),
        ],
      },
    },
  },
  required: ['floors', 'cars', 'events'],
  additionalProperties: false,
};

function createValidator() {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  return ajv.compile<EventScript>(EVENT_SCRIPT_SCHEMA);
}

export function validateEventScript(value: unknown): EventScript {
  const validate = createValidator();
  if (validate(value)) {
    return value;
  }

  const issues = (validate.errors || []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message || 'Unknown validation error',
  }));
  throw new ConfigurationError(
    `event script: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
    issues
  );
}

export function loadEventScript(filePath: string): EventScript {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`event script not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`event script is not valid JSON (${reason})`, { path: filePath });
  }
  return validateEventScript(parsed);
}
