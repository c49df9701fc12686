/**
 * ComputeMarketplace: the public entry points of the compute auction
 * marketplace.
 *
 * Every operation, reads included, runs on one serial queue, so no two
 * operations interleave even when deposits and withdrawals await the
 * token rail. Mutations run inside a state transaction: a rejected
 * operation returns `{ ok: false, error }` and leaves no trace. Exceptions
 * that are not RuntimeErrors are programming errors; they are rethrown
 * after the rollback.
 *
 * @module
 */

import type { BlockClock, ExecutionVerifier } from '../adapters/types.js';
import { AuctionEngine } from '../auction/engine.js';
import type {
  Auction,
  AuctionPhase,
  CreateAuctionInput,
  PlaceBidResult,
} from '../auction/types.js';
import { JobEscrowManager } from '../escrow/manager.js';
import type { EscrowEntry, Job, MilestoneRelease } from '../escrow/types.js';
import {
  MarketplaceEventBus,
  type MarketplaceEvent,
  type MarketplaceEventHandler,
  type MarketplaceEventOf,
  type MarketplaceEventType,
} from '../events/marketplace.js';
import { AccountLedger } from '../ledger/account-ledger.js';
import { ResourceRegistry } from '../registry/registry.js';
import type { ComputeResource, ResourceSpec } from '../registry/types.js';
import { ReputationTracker } from '../reputation/tracker.js';
import type { ReputationRecord } from '../reputation/types.js';
import { StateStore } from '../state/store.js';
import { Treasury } from '../treasury/treasury.js';
import {
  resolveMarketplaceConfig,
  type MarketplaceConfig,
  type ResolvedMarketplaceConfig,
} from '../types/config.js';
import {
  InvalidProofError,
  JobNotFoundError,
  NotAuthorizedError,
  ValidationError,
  isRuntimeError,
} from '../types/errors.js';
import { SerialQueue, toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { fail, ok, type CustodySummary, type MarketplaceResult } from './types.js';

const PRINCIPAL_MAX_LENGTH = 128;

interface Mutation<T> {
  value: T;
  events: MarketplaceEvent[];
  /** Success log line */
  summary: string;
}

export class ComputeMarketplace {
  private readonly settings: ResolvedMarketplaceConfig;
  private readonly logger: Logger;
  private readonly clock: BlockClock;
  private readonly queue = new SerialQueue();
  private readonly store = new StateStore();
  private readonly bus: MarketplaceEventBus;
  private readonly ledger: AccountLedger;
  private readonly registry: ResourceRegistry;
  private readonly treasury: Treasury;
  private readonly reputation: ReputationTracker;
  private readonly escrow: JobEscrowManager;
  private readonly auctions: AuctionEngine;
  private verifier: ExecutionVerifier | null;

  constructor(config: MarketplaceConfig = {}) {
    this.settings = resolveMarketplaceConfig(config);
    this.logger = this.settings.logger;
    this.clock = this.settings.clock;
    this.verifier = this.settings.verifier;
    this.bus = new MarketplaceEventBus(this.logger.child('events'));

    this.ledger = new AccountLedger({
      store: this.store,
      transferRail: this.settings.transferRail,
      custodyAccount: this.settings.custodyAccount,
      logger: this.logger.child('ledger'),
    });
    this.registry = new ResourceRegistry(this.store, this.clock);
    this.treasury = new Treasury(this.store);
    this.reputation = new ReputationTracker(this.store);
    this.escrow = new JobEscrowManager({
      store: this.store,
      ledger: this.ledger,
      treasury: this.treasury,
      reputation: this.reputation,
      feeRatePermille: this.settings.feeRatePermille,
      logger: this.logger.child('escrow'),
    });
    this.auctions = new AuctionEngine({
      store: this.store,
      clock: this.clock,
      ledger: this.ledger,
      escrow: this.escrow,
      auctionDuration: this.settings.auctionDuration,
      logger: this.logger.child('auction'),
    });
  }

  get auctionDuration(): number {
    return this.settings.auctionDuration;
  }

  get feeRatePermille(): number {
    return this.settings.feeRatePermille;
  }

  get custodyAccount(): string {
    return this.settings.custodyAccount;
  }

  // ==========================================================================
  // Resource Registry
  // ==========================================================================

  listResource(caller: string, spec: ResourceSpec): Promise<MarketplaceResult<number>> {
    return this.mutate('listResource', () => {
      const provider = this.callerPrincipal(caller);
      const resource = this.registry.list(provider, spec);
      return {
        value: resource.resourceId,
        events: [
          {
            type: 'resourceListed',
            height: resource.createdAtHeight,
            resourceId: resource.resourceId,
            provider,
          },
        ],
        summary: `Resource ${resource.resourceId} listed by ${provider}`,
      };
    });
  }

  // ==========================================================================
  // Auction Engine
  // ==========================================================================

  createAuction(caller: string, input: CreateAuctionInput): Promise<MarketplaceResult<number>> {
    return this.mutate('createAuction', () => {
      const requester = this.callerPrincipal(caller);
      const auction = this.auctions.createAuction(requester, input);
      return {
        value: auction.auctionId,
        events: [
          {
            type: 'auctionCreated',
            height: auction.createdAtHeight,
            auctionId: auction.auctionId,
            requester,
            startingPrice: auction.startingPrice,
            endHeight: auction.endHeight,
          },
        ],
        summary: `Auction ${auction.auctionId} created by ${requester}, ends at ${auction.endHeight}`,
      };
    });
  }

  placeBid(caller: string, auctionId: number, amount: bigint): Promise<MarketplaceResult<PlaceBidResult>> {
    return this.mutate('placeBid', () => {
      const bidder = this.callerPrincipal(caller);
      const result = this.auctions.placeBid(bidder, auctionId, amount);
      const refund = result.refundedBidder === null
        ? ''
        : `, refunded ${result.refundedAmount} to ${result.refundedBidder}`;
      return {
        value: result,
        events: [{ type: 'bidPlaced', height: this.clock.currentHeight(), ...result }],
        summary: `Auction ${auctionId}: ${bidder} bid ${amount}${refund}`,
      };
    });
  }

  /**
   * End an auction. Returns the new job id, or 0 when nobody bid.
   */
  endAuction(caller: string, auctionId: number): Promise<MarketplaceResult<number>> {
    return this.mutate('endAuction', () => {
      this.callerPrincipal(caller);
      const height = this.clock.currentHeight();
      const result = this.auctions.endAuction(auctionId);
      const events: MarketplaceEvent[] = [{ type: 'auctionEnded', height, ...result }];

      const job = this.escrow.getJob(result.jobId);
      if (job) {
        events.push({
          type: 'jobCreated',
          height,
          jobId: job.jobId,
          auctionId: job.auctionId,
          provider: job.provider,
          requester: job.requester,
          totalPayment: job.totalPayment,
          milestoneCount: job.milestoneCount,
        });
      }

      return {
        value: result.jobId,
        events,
        summary: job
          ? `Auction ${auctionId} settled: job ${job.jobId} for ${job.totalPayment} to ${job.provider}`
          : `Auction ${auctionId} ended without bids`,
      };
    });
  }

  // ==========================================================================
  // Job & Escrow
  // ==========================================================================

  submitExecutionProof(caller: string, jobId: number, proof: string): Promise<MarketplaceResult<Job>> {
    return this.mutate('submitExecutionProof', () => {
      const provider = this.callerPrincipal(caller);
      if (typeof proof !== 'string' || proof.trim().length === 0) {
        throw new ValidationError('proof must be a non-empty string');
      }
      const job = this.escrow.submitExecutionProof(provider, jobId, proof);
      return {
        value: job,
        events: [{ type: 'proofSubmitted', height: this.clock.currentHeight(), jobId, provider }],
        summary: `Job ${jobId}: execution proof submitted by ${provider}`,
      };
    });
  }

  releaseMilestone(
    caller: string,
    jobId: number,
    milestoneIndex: number,
  ): Promise<MarketplaceResult<MilestoneRelease>> {
    return this.mutate('releaseMilestone', () => {
      const requester = this.callerPrincipal(caller);
      const height = this.clock.currentHeight();
      const release = this.escrow.releaseMilestone(requester, jobId, milestoneIndex);
      const events: MarketplaceEvent[] = [
        {
          type: 'milestoneReleased',
          height,
          jobId,
          milestoneIndex,
          amount: release.amount,
          platformFee: release.platformFee,
          providerPayment: release.providerPayment,
        },
      ];

      if (release.jobSettled) {
        const job = this.escrow.getJob(jobId);
        if (job) {
          const record = this.reputation.get(job.provider);
          events.push({
            type: 'reputationUpdated',
            height,
            provider: record.provider,
            score: record.score,
            completedJobs: record.completedJobs,
            totalJobs: record.totalJobs,
          });
        }
      }

      return {
        value: release,
        events,
        summary:
          `Job ${jobId}: milestone ${milestoneIndex} released ` +
          `(${release.providerPayment} to provider, ${release.platformFee} fee)` +
          (release.jobSettled ? ', job settled' : ''),
      };
    });
  }

  // ==========================================================================
  // Account Ledger
  // ==========================================================================

  /** Deposit from the caller's rail wallet. Returns the new balance. */
  depositFunds(caller: string, amount: bigint): Promise<MarketplaceResult<bigint>> {
    return this.run<bigint>('depositFunds', async () => {
      const user = this.callerPrincipal(caller);
      const balance = await this.ledger.deposit(user, amount);
      this.logger.info(`Deposited ${amount} for ${user}`);
      this.bus.emit([
        { type: 'fundsDeposited', height: this.clock.currentHeight(), user, amount, balance },
      ]);
      return balance;
    });
  }

  /** Withdraw to the caller's rail wallet. Returns the new balance. */
  withdrawFunds(caller: string, amount: bigint): Promise<MarketplaceResult<bigint>> {
    return this.run<bigint>('withdrawFunds', async () => {
      const user = this.callerPrincipal(caller);
      const balance = await this.ledger.withdraw(user, amount);
      this.logger.info(`Withdrew ${amount} for ${user}`);
      this.bus.emit([
        { type: 'fundsWithdrawn', height: this.clock.currentHeight(), user, amount, balance },
      ]);
      return balance;
    });
  }

  // ==========================================================================
  // Verification capability
  // ==========================================================================

  get executionVerifier(): ExecutionVerifier | null {
    return this.verifier;
  }

  /** Register or clear the optional verifier. No core flow consults it. */
  registerVerifier(verifier: ExecutionVerifier | null): void {
    this.verifier = verifier;
  }

  /**
   * Run the registered verifier over a job's stored proof. Read-only: the
   * outcome is returned to the caller and never changes job state.
   */
  verifyJobProof(jobId: number): Promise<MarketplaceResult<boolean>> {
    return this.run<boolean>('verifyJobProof', async () => {
      const job = this.escrow.getJob(jobId);
      if (!job) {
        throw new JobNotFoundError(jobId);
      }
      if (job.executionProof === null) {
        throw new InvalidProofError(jobId, 'no proof submitted');
      }
      const verifier = this.verifier;
      if (!verifier) {
        throw new InvalidProofError(jobId, 'no verifier registered');
      }
      try {
        return await verifier.verifyExecution(job.executionProof);
      } catch (err) {
        throw new InvalidProofError(jobId, toErrorMessage(err));
      }
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getResource(resourceId: number): Promise<ComputeResource | null> {
    return this.queue.run(() => this.registry.get(resourceId));
  }

  listResourcesByProvider(provider: string): Promise<ComputeResource[]> {
    return this.queue.run(() => this.registry.listByProvider(provider.trim()));
  }

  getAuction(auctionId: number): Promise<Auction | null> {
    return this.queue.run(() => this.auctions.getAuction(auctionId));
  }

  isAuctionActive(auctionId: number): Promise<boolean> {
    return this.queue.run(() => this.auctions.isAuctionActive(auctionId));
  }

  getAuctionPhase(auctionId: number): Promise<AuctionPhase | null> {
    return this.queue.run(() => this.auctions.getPhase(auctionId));
  }

  getJob(jobId: number): Promise<Job | null> {
    return this.queue.run(() => this.escrow.getJob(jobId));
  }

  getEscrowBalance(jobId: number, milestoneIndex: number): Promise<EscrowEntry | null> {
    return this.queue.run(() => this.escrow.getEscrow(jobId, milestoneIndex));
  }

  getJobEscrow(jobId: number): Promise<EscrowEntry[]> {
    return this.queue.run(() => this.escrow.getJobEscrow(jobId));
  }

  getLockedEscrow(jobId: number): Promise<bigint> {
    return this.queue.run(() => this.escrow.getLockedEscrow(jobId));
  }

  getProviderReputation(provider: string): Promise<ReputationRecord> {
    return this.queue.run(() => this.reputation.get(provider.trim()));
  }

  getUserBalance(user: string): Promise<bigint> {
    return this.queue.run(() => this.ledger.balanceOf(user.trim()));
  }

  getPlatformTreasury(): Promise<bigint> {
    return this.queue.run(() => this.treasury.balance());
  }

  getCustodySummary(): Promise<CustodySummary> {
    return this.queue.run(() => {
      const balances = this.ledger.totalBalances();
      const heldBids = this.auctions.totalHeldBids();
      const lockedEscrow = this.escrow.totalLockedEscrow();
      const treasury = this.treasury.balance();
      return {
        balances,
        heldBids,
        lockedEscrow,
        treasury,
        total: balances + heldBids + lockedEscrow + treasury,
      };
    });
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  subscribe(handler: MarketplaceEventHandler): () => void {
    return this.bus.subscribe(handler);
  }

  on<T extends MarketplaceEventType>(
    type: T,
    handler: MarketplaceEventHandler<MarketplaceEventOf<T>>,
  ): () => void {
    return this.bus.on(type, handler);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Normalize a caller. The custody account only moves tokens on the
   * rail and never acts as a marketplace participant.
   */
  private callerPrincipal(caller: string): string {
    const principal = normalizePrincipal(caller, 'caller');
    if (principal === this.settings.custodyAccount) {
      throw new NotAuthorizedError(principal, 'act as a marketplace participant');
    }
    return principal;
  }

  /** Run a synchronous mutation in a transaction, then publish its events. */
  private mutate<T>(operation: string, fn: () => Mutation<T>): Promise<MarketplaceResult<T>> {
    return this.run(operation, () => {
      const mutation = this.store.transact(fn);
      this.logger.info(mutation.summary);
      this.bus.emit(mutation.events);
      return mutation.value;
    });
  }

  private run<T>(operation: string, fn: () => T | Promise<T>): Promise<MarketplaceResult<T>> {
    return this.queue.run(async () => {
      try {
        return ok(await fn());
      } catch (err) {
        if (isRuntimeError(err)) {
          this.logger.debug(`${operation} rejected [${err.code}]: ${err.message}`);
          return fail<T>(err);
        }
        this.logger.error(`${operation} failed unexpectedly: ${toErrorMessage(err)}`);
        throw err;
      }
    });
  }
}

function normalizePrincipal(raw: string, label: string): string {
  if (typeof raw !== 'string') {
    throw new ValidationError(`${label} must be a string`);
  }
  const principal = raw.trim();
  if (principal.length === 0) {
    throw new ValidationError(`${label} must not be empty`);
  }
  if (principal.length > PRINCIPAL_MAX_LENGTH) {
    throw new ValidationError(`${label} must be <= ${PRINCIPAL_MAX_LENGTH} characters`);
  }
  if (/\s/.test(principal)) {
    throw new ValidationError(`${label} must not contain whitespace`);
  }
  return principal;
}
