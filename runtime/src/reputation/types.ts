/**
 * Types for provider reputation tracking
 * @module
 */

/** Score a provider holds before completing any job. */
export const DEFAULT_REPUTATION_SCORE = 50;

/** Maximum reputation score */
export const REPUTATION_MAX = 100;

/** Minimum reputation score */
export const REPUTATION_MIN = 0;

export interface ReputationRecord {
  provider: string;
  /** Completion rate 0-100 */
  score: number;
  completedJobs: number;
  totalJobs: number;
  /** Lamports earned across settled jobs */
  totalEarned: bigint;
}

export function defaultReputation(provider: string): ReputationRecord {
  return {
    provider,
    score: DEFAULT_REPUTATION_SCORE,
    completedJobs: 0,
    totalJobs: 0,
    totalEarned: 0n,
  };
}
