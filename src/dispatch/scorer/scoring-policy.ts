/**
 * Default Scoring Policy
 */

import type { ScoringPolicy } from './types.js';

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  restingBase: 100,
  restingDistanceWeight: 2,
  zoneBonus: 50,
  scanningBase: 80,
  scanningDistanceWeight: 1,
  loadPenalty: 0.5,
};

/**
 * Merge a partial policy over the defaults
 */
export function resolveScoringPolicy(policy?: Partial<ScoringPolicy>): ScoringPolicy {
  return { ...DEFAULT_SCORING_POLICY, ...policy };
}
