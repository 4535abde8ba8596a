/**
 * Dispatch Error Codes and Classes
 *
 * Configuration errors are raised once, before any event is processed.
 * The remaining codes flag an engine that broke the event contract
 * (a floor outside the building, a car that does not exist, boarding a
 * full car). Valid steady states such as an unassigned call are never errors.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  CONFIGURATION_ERROR: 1001,
  FLEET_NOT_INITIALIZED: 1002,

  INVALID_FLOOR: 2001,
  UNKNOWN_CAR: 2002,
  CAPACITY_EXCEEDED: 2003,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Error Messages
// ============================================================================

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIGURATION_ERROR]: 'Invalid dispatcher configuration',
  [ErrorCodes.FLEET_NOT_INITIALIZED]: 'Fleet has not been initialized',

  [ErrorCodes.INVALID_FLOOR]: 'Floor outside the served range',
  [ErrorCodes.UNKNOWN_CAR]: 'Unknown car',
  [ErrorCodes.CAPACITY_EXCEEDED]: 'Car capacity exceeded',
};

// ============================================================================
// Error Classes
// ============================================================================

export class DispatchError extends Error {
  readonly code: ErrorCode;
  readonly data?: unknown;

  constructor(code: ErrorCode, message?: string, data?: unknown) {
    super(message || ErrorMessages[code]);
    this.name = 'DispatchError';
    this.code = code;
    this.data = data;
  }

  static fromCode(code: ErrorCode, data?: unknown): DispatchError {
    return new DispatchError(code, ErrorMessages[code], data);
  }
}

export class ConfigurationError extends DispatchError {
  constructor(details?: string, data?: unknown) {
    super(
      ErrorCodes.CONFIGURATION_ERROR,
      details ? `Invalid dispatcher configuration: ${details}` : undefined,
      data
    );
    this.name = 'ConfigurationError';
  }

  static fleetNotInitialized(): DispatchError {
    return new DispatchError(ErrorCodes.FLEET_NOT_INITIALIZED);
  }
}

export class InvalidFloorError extends DispatchError {
  readonly floor: number;
  readonly maxFloor: number;

  constructor(floor: number, maxFloor: number) {
    super(
      ErrorCodes.INVALID_FLOOR,
      `Floor ${floor} outside the served range [0, ${maxFloor}]`,
      { floor, maxFloor }
    );
    this.name = 'InvalidFloorError';
    this.floor = floor;
    this.maxFloor = maxFloor;
  }
}

export class UnknownCarError extends DispatchError {
  constructor(carId: number) {
    super(ErrorCodes.UNKNOWN_CAR, `Unknown car: ${carId}`, { carId });
    this.name = 'UnknownCarError';
  }
}

export class CapacityExceededError extends DispatchError {
  constructor(carId: number, capacity: number) {
    super(
      ErrorCodes.CAPACITY_EXCEEDED,
      `Car ${carId} is already carrying its capacity of ${capacity}`,
      { carId, capacity }
    );
    this.name = 'CapacityExceededError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isDispatchError(error: unknown): error is DispatchError {
  return error instanceof DispatchError;
}

/**
 * Reject floors that are not integers inside [0, maxFloor].
 */
export function assertFloor(floor: number, maxFloor: number): void {
  if (!Number.isInteger(floor) || floor < 0 || floor > maxFloor) {
    throw new InvalidFloorError(floor, maxFloor);
  }
}
