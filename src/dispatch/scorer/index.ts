/**
 * Dispatch Scorer Module
 */

export type { IDispatchScorer, ScoringPolicy, CandidateScore } from './types.js';
export { DispatchScorer } from './dispatch-scorer.js';
export { DEFAULT_SCORING_POLICY, resolveScoringPolicy } from './scoring-policy.js';
