/**
 * Provider reputation module.
 *
 * @module
 */

export { ReputationTracker, computeReputationScore } from './tracker.js';

export {
  DEFAULT_REPUTATION_SCORE,
  REPUTATION_MAX,
  REPUTATION_MIN,
  defaultReputation,
  type ReputationRecord,
} from './types.js';
