/**
 * JobEscrowManager: jobs created from settled auctions and the milestone
 * escrow that pays their providers.
 *
 * Escrowed funds were already debited from the winning bidder's balance
 * when the bid was accepted; releasing a milestone moves its amount, net
 * of the platform fee, to the provider's balance and the fee to the
 * treasury.
 *
 * @module
 */

import type { AccountLedger } from '../ledger/account-ledger.js';
import type { ReputationTracker } from '../reputation/tracker.js';
import type { StateStore } from '../state/store.js';
import type { Treasury } from '../treasury/treasury.js';
import {
  AlreadyCompletedError,
  JobNotFoundError,
  MilestoneNotReadyError,
  NotAuthorizedError,
  ValidationError,
  validateAmount,
} from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { applyPermille, sumBigInt } from '../utils/numeric.js';
import {
  escrowKey,
  type CreateJobInput,
  type EscrowEntry,
  type Job,
  type MilestoneRelease,
} from './types.js';

export interface JobEscrowManagerConfig {
  store: StateStore;
  ledger: AccountLedger;
  treasury: Treasury;
  reputation: ReputationTracker;
  feeRatePermille: number;
  logger?: Logger;
}

/**
 * Split `total` into `milestoneCount` shares. Every milestone but the last
 * gets `floor(total / milestoneCount)`; the last absorbs the remainder, so
 * the shares always sum to `total`.
 *
 * @example
 * ```typescript
 * partitionEscrow(200n, 3); // [66n, 66n, 68n]
 * ```
 */
export function partitionEscrow(total: bigint, milestoneCount: number): bigint[] {
  validateAmount(total, 'escrow total');
  if (!Number.isSafeInteger(milestoneCount) || milestoneCount < 1) {
    throw new ValidationError(`milestoneCount must be a positive integer (got ${milestoneCount})`);
  }

  const share = total / BigInt(milestoneCount);
  const shares: bigint[] = [];
  for (let index = 1; index < milestoneCount; index++) {
    shares.push(share);
  }
  shares.push(total - share * BigInt(milestoneCount - 1));
  return shares;
}

export class JobEscrowManager {
  private readonly store: StateStore;
  private readonly ledger: AccountLedger;
  private readonly treasury: Treasury;
  private readonly reputation: ReputationTracker;
  private readonly feeRatePermille: number;
  private readonly logger: Logger;

  constructor(config: JobEscrowManagerConfig) {
    this.store = config.store;
    this.ledger = config.ledger;
    this.treasury = config.treasury;
    this.reputation = config.reputation;
    this.feeRatePermille = config.feeRatePermille;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Create an active job and its escrow entries. Called by the auction
   * engine at settlement, once per settled auction.
   */
  createJob(input: CreateJobInput): Job {
    const job: Job = {
      jobId: this.store.nextId('job'),
      auctionId: input.auctionId,
      provider: input.provider,
      requester: input.requester,
      totalPayment: input.totalPayment,
      milestoneCount: input.milestoneCount,
      completedMilestones: 0,
      executionProof: null,
      status: 'active',
    };

    this.store.state.jobs.set(job.jobId, job);
    this.setupEscrow(job.jobId, job.totalPayment, job.milestoneCount);
    this.logger.debug(`Job ${job.jobId} escrowed ${job.totalPayment} over ${job.milestoneCount} milestones`);
    return { ...job };
  }

  /** Write the escrow entries for milestones 1..milestoneCount. */
  setupEscrow(jobId: number, total: bigint, milestoneCount: number): EscrowEntry[] {
    const shares = partitionEscrow(total, milestoneCount);
    return shares.map((amount, offset) => {
      const entry: EscrowEntry = {
        jobId,
        milestoneIndex: offset + 1,
        amount,
        released: false,
      };
      this.store.state.escrow.set(escrowKey(jobId, entry.milestoneIndex), entry);
      return { ...entry };
    });
  }

  /**
   * Attach the provider's execution proof and mark the job completed.
   * The proof is self-attested; nothing here verifies it.
   */
  submitExecutionProof(caller: string, jobId: number, proof: string): Job {
    const job = this.requireJob(jobId);
    if (caller !== job.provider) {
      throw new NotAuthorizedError(caller, `submit a proof for job ${jobId}`);
    }
    if (job.status !== 'active') {
      throw new AlreadyCompletedError(`Job ${jobId}`);
    }

    job.executionProof = proof;
    job.status = 'completed';
    return { ...job };
  }

  /**
   * Pay out one milestone to the provider, net of the platform fee.
   *
   * NOTE: completion is driven by the milestone count alone. Releasing the
   * final milestone settles the job and updates reputation even if no
   * execution proof was ever submitted. Whether releases should require a
   * proof is an open question (DESIGN.md); do not add the check here
   * without changing the settlement rules.
   */
  releaseMilestone(caller: string, jobId: number, milestoneIndex: number): MilestoneRelease {
    const job = this.requireJob(jobId);
    const entry = this.store.state.escrow.get(escrowKey(jobId, milestoneIndex));
    if (!entry) {
      throw new MilestoneNotReadyError(jobId, milestoneIndex);
    }
    if (caller !== job.requester) {
      throw new NotAuthorizedError(caller, `release milestones of job ${jobId}`);
    }
    if (entry.released) {
      throw new AlreadyCompletedError(`Milestone ${milestoneIndex} of job ${jobId}`);
    }
    if (milestoneIndex > job.milestoneCount) {
      throw new MilestoneNotReadyError(jobId, milestoneIndex);
    }

    const platformFee = applyPermille(entry.amount, this.feeRatePermille);
    const providerPayment = entry.amount - platformFee;

    this.ledger.credit(job.provider, providerPayment);
    this.treasury.accrue(platformFee);
    entry.released = true;
    job.completedMilestones += 1;

    const jobSettled = job.completedMilestones === job.milestoneCount;
    if (jobSettled) {
      this.reputation.recordCompletedJob(job.provider, job.totalPayment);
    }

    return {
      jobId,
      milestoneIndex,
      amount: entry.amount,
      platformFee,
      providerPayment,
      completedMilestones: job.completedMilestones,
      jobSettled,
    };
  }

  getJob(jobId: number): Job | null {
    const job = this.store.state.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  getEscrow(jobId: number, milestoneIndex: number): EscrowEntry | null {
    const entry = this.store.state.escrow.get(escrowKey(jobId, milestoneIndex));
    return entry ? { ...entry } : null;
  }

  /** All escrow entries of a job, by milestone index. */
  getJobEscrow(jobId: number): EscrowEntry[] {
    const job = this.store.state.jobs.get(jobId);
    if (!job) return [];

    const entries: EscrowEntry[] = [];
    for (let index = 1; index <= job.milestoneCount; index++) {
      const entry = this.store.state.escrow.get(escrowKey(jobId, index));
      if (entry) entries.push({ ...entry });
    }
    return entries;
  }

  /** Unreleased escrow of one job. */
  getLockedEscrow(jobId: number): bigint {
    return sumBigInt(
      this.getJobEscrow(jobId)
        .filter((entry) => !entry.released)
        .map((entry) => entry.amount),
    );
  }

  /** Unreleased escrow across all jobs. */
  totalLockedEscrow(): bigint {
    return sumBigInt(
      Array.from(this.store.state.escrow.values())
        .filter((entry) => !entry.released)
        .map((entry) => entry.amount),
    );
  }

  private requireJob(jobId: number): Job {
    const job = this.store.state.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
