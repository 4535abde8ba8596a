/**
 * Fleet Module
 */

export type { IFleet } from './types.js';
export { Fleet } from './fleet.js';
export {
  isFull,
  loadFactor,
  isAhead,
  targetsAhead,
  opposite,
  directionToward,
  toCarSnapshot,
} from './car-state.js';
