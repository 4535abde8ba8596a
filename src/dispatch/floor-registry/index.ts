/**
 * Floor Request Registry Module
 */

export type { IFloorRequestRegistry } from './types.js';
export { FloorRequestRegistry } from './floor-request-registry.js';
