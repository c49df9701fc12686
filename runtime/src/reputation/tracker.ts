/**
 * ReputationTracker: provider completion scores.
 *
 * A provider's record changes only when a job's final milestone is
 * released. The score is the completion ratio as a percentage.
 *
 * @module
 */

import type { StateStore } from '../state/store.js';
import { validateAmount } from '../types/errors.js';
import { clampInteger, percentFloor } from '../utils/numeric.js';
import {
  defaultReputation,
  REPUTATION_MAX,
  REPUTATION_MIN,
  type ReputationRecord,
} from './types.js';

/**
 * `floor(completed * 100 / total)` clamped to [0, 100]. The lower clamp
 * cannot trigger for non-negative counts.
 */
export function computeReputationScore(completedJobs: number, totalJobs: number): number {
  return clampInteger(percentFloor(completedJobs, totalJobs), REPUTATION_MIN, REPUTATION_MAX);
}

export class ReputationTracker {
  constructor(private readonly store: StateStore) {}

  /** Current record, or the neutral default (score 50) for an unknown provider. */
  get(provider: string): ReputationRecord {
    const record = this.store.state.reputation.get(provider);
    return record ? { ...record } : defaultReputation(provider);
  }

  /**
   * Record one settled job for `provider`.
   *
   * Both counters advance together, so today every score written here is
   * 100; `totalJobs` is kept separate for failure outcomes recorded later.
   */
  recordCompletedJob(provider: string, earned: bigint): ReputationRecord {
    validateAmount(earned, 'earned amount');
    const current = this.get(provider);

    const completedJobs = current.completedJobs + 1;
    const totalJobs = current.totalJobs + 1;
    const next: ReputationRecord = {
      provider,
      completedJobs,
      totalJobs,
      totalEarned: current.totalEarned + earned,
      score: computeReputationScore(completedJobs, totalJobs),
    };

    this.store.state.reputation.set(provider, next);
    return { ...next };
  }
}
