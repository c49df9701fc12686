/**
 * Types for the auction engine
 * @module
 */

/** Minimum capacity a requester asks bidders to supply. */
export interface ResourceRequirements {
  gpu: number;
  cpu: number;
  ram: number;
}

export interface CreateAuctionInput {
  requirements: ResourceRequirements;
  /** Maximum job duration in blocks. Informational; settlement ignores it. */
  maxDuration: number;
  startingPrice: bigint;
}

export interface Auction {
  auctionId: number;
  requester: string;
  requirements: ResourceRequirements;
  maxDuration: number;
  startingPrice: bigint;
  /** Highest accepted bid, or the starting price while no bid exists */
  currentBid: bigint;
  /** Null iff no bid has been accepted */
  currentBidder: string | null;
  endHeight: number;
  ended: boolean;
  createdAtHeight: number;
}

/**
 * Derived lifecycle phase.
 *
 * - `open`: accepting bids (`height < endHeight`, not ended)
 * - `awaiting_settlement`: end height reached, `endAuction` not yet called
 * - `settled`: ended with a winner
 * - `unsettled`: ended without any bid
 */
export type AuctionPhase = 'open' | 'awaiting_settlement' | 'settled' | 'unsettled';

export interface PlaceBidResult {
  auctionId: number;
  bidder: string;
  amount: bigint;
  /** Bidder whose previous bid was credited back, if any */
  refundedBidder: string | null;
  refundedAmount: bigint;
}

export interface EndAuctionResult {
  auctionId: number;
  /** New job id, or 0 when the auction ended without a bid */
  jobId: number;
  winner: string | null;
  finalBid: bigint;
}

/** Job id returned by `endAuction` when no bid was placed. */
export const NO_JOB_ID = 0;
