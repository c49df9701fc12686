/**
 * End-to-end settlement tests for @gridmarket/runtime
 *
 * Drives the full flow (deposit, auction, bidding, settlement, milestone
 * release, withdrawal) through the public facade against the in-memory
 * clock and token rail, and checks custody conservation after every step.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  BidTooLowError,
  ComputeMarketplace,
  InMemoryTransferRail,
  ManualBlockClock,
  RuntimeErrorCodes,
  type MarketplaceEvent,
  type MarketplaceResult,
} from '../src/index.js';

const CUSTODY = 'marketplace:custody';

function unwrap<T>(result: MarketplaceResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('Settlement Integration', () => {
  let clock: ManualBlockClock;
  let rail: InMemoryTransferRail;
  let marketplace: ComputeMarketplace;
  let netDeposits: bigint;

  async function expectConserved(): Promise<void> {
    const summary = await marketplace.getCustodySummary();
    expect(summary.total).toBe(netDeposits);
    expect(rail.balanceOf(CUSTODY)).toBe(netDeposits);
  }

  beforeEach(async () => {
    clock = new ManualBlockClock(1_000);
    rail = new InMemoryTransferRail();
    rail.fund('bidder-a', 1_000n);
    rail.fund('bidder-b', 1_000n);
    marketplace = new ComputeMarketplace({ clock, transferRail: rail });

    unwrap(await marketplace.depositFunds('bidder-a', 500n));
    unwrap(await marketplace.depositFunds('bidder-b', 500n));
    netDeposits = 1_000n;
  });

  // ==========================================================================
  // Full lifecycle
  // ==========================================================================

  it('runs an auction through to a settled job', async () => {
    const events: MarketplaceEvent[] = [];
    marketplace.subscribe((event) => events.push(event));

    const resourceId = unwrap(
      await marketplace.listResource('bidder-b', { gpu: 4, cpu: 32, ram: 128, hourlyRate: 40n }),
    );
    expect(resourceId).toBe(1);

    const auctionId = unwrap(
      await marketplace.createAuction('requester', {
        requirements: { gpu: 2, cpu: 16, ram: 64 },
        maxDuration: 12,
        startingPrice: 100n,
      }),
    );
    expect((await marketplace.getAuction(auctionId))?.endHeight).toBe(1_144);

    // Bidding
    unwrap(await marketplace.placeBid('bidder-a', auctionId, 150n));
    expect(await marketplace.getUserBalance('bidder-a')).toBe(350n);
    await expectConserved();

    const lowBid = await marketplace.placeBid('bidder-b', auctionId, 140n);
    expect(lowBid.ok).toBe(false);
    if (!lowBid.ok) {
      expect(lowBid.error).toBeInstanceOf(BidTooLowError);
    }

    const outbid = unwrap(await marketplace.placeBid('bidder-b', auctionId, 200n));
    expect(outbid.refundedBidder).toBe('bidder-a');
    expect(await marketplace.getUserBalance('bidder-a')).toBe(500n);
    expect(await marketplace.getUserBalance('bidder-b')).toBe(300n);
    await expectConserved();

    // Settlement
    clock.advance(144);
    const jobId = unwrap(await marketplace.endAuction('bidder-a', auctionId));
    expect(jobId).toBe(1);
    expect(await marketplace.getJob(jobId)).toMatchObject({
      provider: 'bidder-b',
      requester: 'requester',
      totalPayment: 200n,
      milestoneCount: 3,
      status: 'active',
    });
    expect((await marketplace.getJobEscrow(jobId)).map((entry) => entry.amount)).toEqual([66n, 66n, 68n]);
    await expectConserved();

    // Proof and milestone releases
    unwrap(await marketplace.submitExecutionProof('bidder-b', jobId, 'sha256:placeholder-proof'));

    const first = unwrap(await marketplace.releaseMilestone('requester', jobId, 1));
    expect(first.platformFee).toBe(1n);
    expect(first.providerPayment).toBe(65n);
    unwrap(await marketplace.releaseMilestone('requester', jobId, 2));
    const last = unwrap(await marketplace.releaseMilestone('requester', jobId, 3));
    expect(last.platformFee).toBe(1n);
    expect(last.providerPayment).toBe(67n);
    expect(last.jobSettled).toBe(true);

    expect(await marketplace.getUserBalance('bidder-b')).toBe(497n);
    expect(await marketplace.getPlatformTreasury()).toBe(3n);
    expect(await marketplace.getLockedEscrow(jobId)).toBe(0n);
    expect(await marketplace.getProviderReputation('bidder-b')).toEqual({
      provider: 'bidder-b',
      score: 100,
      completedJobs: 1,
      totalJobs: 1,
      totalEarned: 200n,
    });
    await expectConserved();

    // Provider cashes out
    expect(unwrap(await marketplace.withdrawFunds('bidder-b', 497n))).toBe(0n);
    netDeposits -= 497n;
    expect(rail.balanceOf('bidder-b')).toBe(997n);
    await expectConserved();

    expect(events.filter((event) => event.type === 'reputationUpdated')).toHaveLength(1);
    expect(events.filter((event) => event.type === 'milestoneReleased')).toHaveLength(3);
  });

  // ==========================================================================
  // Failure paths leave no trace
  // ==========================================================================

  it('rejects an over-balance withdrawal without moving funds', async () => {
    const result = await marketplace.withdrawFunds('bidder-a', 501n);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(RuntimeErrorCodes.INSUFFICIENT_BALANCE);
    }
    expect(await marketplace.getUserBalance('bidder-a')).toBe(500n);
    expect(rail.balanceOf('bidder-a')).toBe(500n);
    await expectConserved();
  });

  it('refuses the custody account as a participant', async () => {
    const auctionId = unwrap(
      await marketplace.createAuction('requester', {
        requirements: { gpu: 1, cpu: 1, ram: 1 },
        maxDuration: 1,
        startingPrice: 10n,
      }),
    );

    const deposit = await marketplace.depositFunds(CUSTODY, 500n);
    const bid = await marketplace.placeBid(CUSTODY, auctionId, 450n);
    const withdrawal = await marketplace.withdrawFunds(CUSTODY, 1n);

    for (const result of [deposit, bid, withdrawal]) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(RuntimeErrorCodes.NOT_AUTHORIZED);
      }
    }
    expect(await marketplace.getUserBalance(CUSTODY)).toBe(0n);
    expect((await marketplace.getAuction(auctionId))?.currentBidder).toBeNull();
    await expectConserved();
  });

  it('holds bids across concurrent auctions', async () => {
    const first = unwrap(
      await marketplace.createAuction('requester', {
        requirements: { gpu: 1, cpu: 1, ram: 1 },
        maxDuration: 1,
        startingPrice: 10n,
      }),
    );
    const second = unwrap(
      await marketplace.createAuction('requester', {
        requirements: { gpu: 1, cpu: 1, ram: 1 },
        maxDuration: 1,
        startingPrice: 10n,
      }),
    );

    unwrap(await marketplace.placeBid('bidder-a', first, 300n));
    const tooMuch = await marketplace.placeBid('bidder-a', second, 300n);
    expect(tooMuch.ok).toBe(false);
    unwrap(await marketplace.placeBid('bidder-a', second, 200n));

    expect(await marketplace.getCustodySummary()).toEqual({
      balances: 500n,
      heldBids: 500n,
      lockedEscrow: 0n,
      treasury: 0n,
      total: 1_000n,
    });
  });

  it('settles an auction without bids into no job', async () => {
    const auctionId = unwrap(
      await marketplace.createAuction('requester', {
        requirements: { gpu: 0, cpu: 1, ram: 1 },
        maxDuration: 1,
        startingPrice: 50n,
      }),
    );

    clock.advance(143);
    expect(await marketplace.isAuctionActive(auctionId)).toBe(true);
    clock.advance(1);
    expect(await marketplace.isAuctionActive(auctionId)).toBe(false);

    expect(unwrap(await marketplace.endAuction('anyone', auctionId))).toBe(0);
    const again = await marketplace.endAuction('anyone', auctionId);
    expect(again.ok).toBe(false);
    if (!again.ok) {
      expect(again.error.code).toBe(RuntimeErrorCodes.ALREADY_COMPLETED);
    }
    await expectConserved();
  });
});
