/**
 * Types for jobs and milestone escrow
 * @module
 */

/**
 * Job status. `disputed` is part of the data model but no operation
 * enters it.
 */
export type JobStatus = 'active' | 'completed' | 'disputed';

export interface Job {
  jobId: number;
  auctionId: number;
  /** Winning bidder, paid out of escrow */
  provider: string;
  /** Auction creator, approves milestone releases */
  requester: string;
  totalPayment: bigint;
  milestoneCount: number;
  completedMilestones: number;
  executionProof: string | null;
  status: JobStatus;
}

/** Escrow held for one milestone. Indices run from 1 to milestoneCount. */
export interface EscrowEntry {
  jobId: number;
  milestoneIndex: number;
  amount: bigint;
  released: boolean;
}

export interface CreateJobInput {
  auctionId: number;
  provider: string;
  requester: string;
  totalPayment: bigint;
  milestoneCount: number;
}

export interface MilestoneRelease {
  jobId: number;
  milestoneIndex: number;
  amount: bigint;
  platformFee: bigint;
  providerPayment: bigint;
  completedMilestones: number;
  /** True when this release completed the job's last milestone */
  jobSettled: boolean;
}

export function escrowKey(jobId: number, milestoneIndex: number): string {
  return `${jobId}:${milestoneIndex}`;
}
