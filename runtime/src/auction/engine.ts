/**
 * AuctionEngine: timed English auctions for compute jobs.
 *
 * An auction is open while `height < endHeight`. Each accepted bid must
 * strictly exceed the current one; the displaced bidder is refunded in
 * full before the new bidder is debited. Anyone may end an auction once
 * its end height is reached, which turns a winning bid into a job with
 * milestone escrow.
 *
 * @module
 */

import type { BlockClock } from '../adapters/types.js';
import type { JobEscrowManager } from '../escrow/manager.js';
import type { AccountLedger } from '../ledger/account-ledger.js';
import type { StateStore } from '../state/store.js';
import { JOB_MILESTONE_COUNT } from '../types/config.js';
import {
  AlreadyCompletedError,
  AuctionActiveError,
  AuctionEndedError,
  AuctionNotFoundError,
  BidTooLowError,
  InsufficientBalanceError,
  validateAmount,
  validateNonNegativeInteger,
} from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import {
  NO_JOB_ID,
  type Auction,
  type AuctionPhase,
  type CreateAuctionInput,
  type EndAuctionResult,
  type PlaceBidResult,
} from './types.js';

export interface AuctionEngineConfig {
  store: StateStore;
  clock: BlockClock;
  ledger: AccountLedger;
  escrow: JobEscrowManager;
  /** Blocks between creation and end height */
  auctionDuration: number;
  logger?: Logger;
}

export class AuctionEngine {
  private readonly store: StateStore;
  private readonly clock: BlockClock;
  private readonly ledger: AccountLedger;
  private readonly escrow: JobEscrowManager;
  private readonly auctionDuration: number;
  private readonly logger: Logger;

  constructor(config: AuctionEngineConfig) {
    this.store = config.store;
    this.clock = config.clock;
    this.ledger = config.ledger;
    this.escrow = config.escrow;
    this.auctionDuration = config.auctionDuration;
    this.logger = config.logger ?? silentLogger;
  }

  createAuction(requester: string, input: CreateAuctionInput): Auction {
    validateNonNegativeInteger(input.requirements.gpu, 'requirements.gpu');
    validateNonNegativeInteger(input.requirements.cpu, 'requirements.cpu');
    validateNonNegativeInteger(input.requirements.ram, 'requirements.ram');
    validateNonNegativeInteger(input.maxDuration, 'maxDuration');
    validateAmount(input.startingPrice, 'startingPrice');

    const height = this.clock.currentHeight();
    const auction: Auction = {
      auctionId: this.store.nextId('auction'),
      requester,
      requirements: { ...input.requirements },
      maxDuration: input.maxDuration,
      startingPrice: input.startingPrice,
      currentBid: input.startingPrice,
      currentBidder: null,
      endHeight: height + this.auctionDuration,
      ended: false,
      createdAtHeight: height,
    };

    this.store.state.auctions.set(auction.auctionId, auction);
    return cloneAuction(auction);
  }

  /**
   * Place a bid that strictly exceeds the current bid.
   *
   * The balance check uses the bidder's balance before any refund, so a
   * bidder raising their own bid needs the full new amount available.
   *
   * @throws AuctionNotFoundError
   * @throws AuctionEndedError at or past the end height, or once ended
   * @throws BidTooLowError when `amount <= currentBid`
   * @throws InsufficientBalanceError
   */
  placeBid(bidder: string, auctionId: number, amount: bigint): PlaceBidResult {
    const auction = this.requireAuction(auctionId);
    const height = this.clock.currentHeight();

    if (auction.ended || height >= auction.endHeight) {
      throw new AuctionEndedError(auctionId, auction.endHeight);
    }
    if (amount <= auction.currentBid) {
      throw new BidTooLowError(amount, auction.currentBid);
    }
    const balance = this.ledger.balanceOf(bidder);
    if (balance < amount) {
      throw new InsufficientBalanceError(bidder, amount, balance);
    }

    const refundedBidder = auction.currentBidder;
    const refundedAmount = refundedBidder === null ? 0n : auction.currentBid;

    // Refund strictly before debit.
    if (refundedBidder !== null) {
      this.ledger.credit(refundedBidder, refundedAmount);
    }
    this.ledger.debit(bidder, amount);

    auction.currentBid = amount;
    auction.currentBidder = bidder;

    this.logger.debug(`Auction ${auctionId}: ${bidder} bid ${amount}`);
    return { auctionId, bidder, amount, refundedBidder, refundedAmount };
  }

  /**
   * End an auction at or after its end height. Callable by anyone.
   *
   * With a winner, creates a job paid by the final bid and split into
   * {@link JOB_MILESTONE_COUNT} milestones. Without one, returns job id 0
   * and creates nothing.
   *
   * @throws AuctionNotFoundError
   * @throws AuctionActiveError before the end height
   * @throws AlreadyCompletedError when already ended
   */
  endAuction(auctionId: number): EndAuctionResult {
    const auction = this.requireAuction(auctionId);
    const height = this.clock.currentHeight();

    if (height < auction.endHeight) {
      throw new AuctionActiveError(auctionId, auction.endHeight - height);
    }
    if (auction.ended) {
      throw new AlreadyCompletedError(`Auction ${auctionId}`);
    }

    auction.ended = true;

    if (auction.currentBidder === null) {
      this.logger.debug(`Auction ${auctionId} ended without bids`);
      return { auctionId, jobId: NO_JOB_ID, winner: null, finalBid: auction.currentBid };
    }

    const job = this.escrow.createJob({
      auctionId,
      provider: auction.currentBidder,
      requester: auction.requester,
      totalPayment: auction.currentBid,
      milestoneCount: JOB_MILESTONE_COUNT,
    });

    return {
      auctionId,
      jobId: job.jobId,
      winner: auction.currentBidder,
      finalBid: auction.currentBid,
    };
  }

  getAuction(auctionId: number): Auction | null {
    const auction = this.store.state.auctions.get(auctionId);
    return auction ? cloneAuction(auction) : null;
  }

  isAuctionActive(auctionId: number): boolean {
    return this.getPhase(auctionId) === 'open';
  }

  getPhase(auctionId: number): AuctionPhase | null {
    const auction = this.store.state.auctions.get(auctionId);
    if (!auction) return null;

    if (auction.ended) {
      return auction.currentBidder === null ? 'unsettled' : 'settled';
    }
    return this.clock.currentHeight() < auction.endHeight ? 'open' : 'awaiting_settlement';
  }

  /** Sum of winning bids held by auctions that have not ended yet. */
  totalHeldBids(): bigint {
    let total = 0n;
    for (const auction of this.store.state.auctions.values()) {
      if (!auction.ended && auction.currentBidder !== null) {
        total += auction.currentBid;
      }
    }
    return total;
  }

  private requireAuction(auctionId: number): Auction {
    const auction = this.store.state.auctions.get(auctionId);
    if (!auction) {
      throw new AuctionNotFoundError(auctionId);
    }
    return auction;
  }
}

function cloneAuction(auction: Auction): Auction {
  return { ...auction, requirements: { ...auction.requirements } };
}
