/**
 * Marketplace event types and the in-process event bus.
 *
 * Events are emitted after an operation commits; a rolled-back operation
 * emits nothing.
 *
 * @module
 */

import { toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

interface EventBase {
  /** Block height the operation executed at */
  height: number;
}

export interface ResourceListedEvent extends EventBase {
  type: 'resourceListed';
  resourceId: number;
  provider: string;
}

export interface AuctionCreatedEvent extends EventBase {
  type: 'auctionCreated';
  auctionId: number;
  requester: string;
  startingPrice: bigint;
  endHeight: number;
}

export interface BidPlacedEvent extends EventBase {
  type: 'bidPlaced';
  auctionId: number;
  bidder: string;
  amount: bigint;
  refundedBidder: string | null;
  refundedAmount: bigint;
}

export interface AuctionEndedEvent extends EventBase {
  type: 'auctionEnded';
  auctionId: number;
  /** 0 when the auction ended without bids */
  jobId: number;
  winner: string | null;
  finalBid: bigint;
}

export interface JobCreatedEvent extends EventBase {
  type: 'jobCreated';
  jobId: number;
  auctionId: number;
  provider: string;
  requester: string;
  totalPayment: bigint;
  milestoneCount: number;
}

export interface ProofSubmittedEvent extends EventBase {
  type: 'proofSubmitted';
  jobId: number;
  provider: string;
}

export interface MilestoneReleasedEvent extends EventBase {
  type: 'milestoneReleased';
  jobId: number;
  milestoneIndex: number;
  amount: bigint;
  platformFee: bigint;
  providerPayment: bigint;
}

export interface ReputationUpdatedEvent extends EventBase {
  type: 'reputationUpdated';
  provider: string;
  score: number;
  completedJobs: number;
  totalJobs: number;
}

export interface FundsDepositedEvent extends EventBase {
  type: 'fundsDeposited';
  user: string;
  amount: bigint;
  balance: bigint;
}

export interface FundsWithdrawnEvent extends EventBase {
  type: 'fundsWithdrawn';
  user: string;
  amount: bigint;
  balance: bigint;
}

export type MarketplaceEvent =
  | ResourceListedEvent
  | AuctionCreatedEvent
  | BidPlacedEvent
  | AuctionEndedEvent
  | JobCreatedEvent
  | ProofSubmittedEvent
  | MilestoneReleasedEvent
  | ReputationUpdatedEvent
  | FundsDepositedEvent
  | FundsWithdrawnEvent;

export type MarketplaceEventType = MarketplaceEvent['type'];

export type MarketplaceEventOf<T extends MarketplaceEventType> = Extract<MarketplaceEvent, { type: T }>;

export type MarketplaceEventHandler<E extends MarketplaceEvent = MarketplaceEvent> = (event: E) => void;

export function isEventOfType<T extends MarketplaceEventType>(
  event: MarketplaceEvent,
  type: T,
): event is MarketplaceEventOf<T> {
  return event.type === type;
}

/**
 * Synchronous fan-out to subscribers. A throwing handler is logged and
 * does not stop delivery to the others.
 */
export class MarketplaceEventBus {
  private readonly handlers = new Set<MarketplaceEventHandler>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /** Receive every event. Returns an unsubscribe function. */
  subscribe(handler: MarketplaceEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Receive events of one type. Returns an unsubscribe function. */
  on<T extends MarketplaceEventType>(
    type: T,
    handler: MarketplaceEventHandler<MarketplaceEventOf<T>>,
  ): () => void {
    return this.subscribe((event) => {
      if (isEventOfType(event, type)) {
        handler(event);
      }
    });
  }

  emit(events: readonly MarketplaceEvent[]): void {
    for (const event of events) {
      for (const handler of Array.from(this.handlers)) {
        try {
          handler(event);
        } catch (err) {
          this.logger.error(`Event handler failed for ${event.type}: ${toErrorMessage(err)}`);
        }
      }
    }
  }

  get listenerCount(): number {
    return this.handlers.size;
  }
}
