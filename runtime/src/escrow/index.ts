/**
 * Job and milestone escrow module.
 *
 * @module
 */

export { JobEscrowManager, partitionEscrow, type JobEscrowManagerConfig } from './manager.js';

export {
  escrowKey,
  type CreateJobInput,
  type EscrowEntry,
  type Job,
  type JobStatus,
  type MilestoneRelease,
} from './types.js';
