import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ComputeMarketplace } from './compute-marketplace.js';
import type { MarketplaceResult } from './types.js';
import { InMemoryTransferRail, ManualBlockClock } from '../adapters/memory.js';
import type { ExecutionVerifier } from '../adapters/types.js';
import type { MarketplaceEvent } from '../events/marketplace.js';
import { RuntimeErrorCodes, type RuntimeErrorCode } from '../types/errors.js';

const REQUIREMENTS = { gpu: 1, cpu: 8, ram: 32 };

function unwrap<T>(result: MarketplaceResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function errorCode<T>(result: MarketplaceResult<T>): RuntimeErrorCode | null {
  return result.ok ? null : result.error.code;
}

describe('ComputeMarketplace', () => {
  let clock: ManualBlockClock;
  let rail: InMemoryTransferRail;
  let marketplace: ComputeMarketplace;

  beforeEach(() => {
    clock = new ManualBlockClock(10);
    rail = new InMemoryTransferRail();
    rail.fund('alice', 1_000n);
    rail.fund('bob', 1_000n);
    marketplace = new ComputeMarketplace({ clock, transferRail: rail });
  });

  async function settledJob(): Promise<number> {
    unwrap(await marketplace.depositFunds('bob', 500n));
    const auctionId = unwrap(
      await marketplace.createAuction('requester', { requirements: REQUIREMENTS, maxDuration: 24, startingPrice: 100n }),
    );
    unwrap(await marketplace.placeBid('bob', auctionId, 200n));
    clock.advance(144);
    return unwrap(await marketplace.endAuction('anyone', auctionId));
  }

  describe('configuration', () => {
    it('exposes resolved settings', () => {
      expect(marketplace.auctionDuration).toBe(144);
      expect(marketplace.feeRatePermille).toBe(25);
      expect(marketplace.custodyAccount).toBe('marketplace:custody');
    });

    it('throws on invalid configuration', () => {
      expect(() => new ComputeMarketplace({ feeRatePermille: -1 })).toThrow(
        'Invalid marketplace config: feeRatePermille must be an integer between 0 and 1000',
      );
    });
  });

  describe('listResource', () => {
    it('returns sequential ids and stores the listing', async () => {
      expect(unwrap(await marketplace.listResource('provider-a', { gpu: 1, cpu: 4, ram: 16, hourlyRate: 10n }))).toBe(1);
      expect(unwrap(await marketplace.listResource('provider-a', { gpu: 0, cpu: 2, ram: 8, hourlyRate: 5n }))).toBe(2);

      const resource = await marketplace.getResource(1);
      expect(resource).toMatchObject({ provider: 'provider-a', cpu: 4, createdAtHeight: 10 });
      expect((await marketplace.listResourcesByProvider('provider-a')).length).toBe(2);
      expect(await marketplace.getResource(3)).toBeNull();
    });

    it('normalizes and validates the caller', async () => {
      unwrap(await marketplace.listResource('  provider-a ', { gpu: 1, cpu: 1, ram: 1, hourlyRate: 1n }));
      expect((await marketplace.getResource(1))?.provider).toBe('provider-a');

      const result = await marketplace.listResource('two words', { gpu: 1, cpu: 1, ram: 1, hourlyRate: 1n });
      expect(errorCode(result)).toBe(RuntimeErrorCodes.VALIDATION_ERROR);
    });

    it('does not consume an id on failure', async () => {
      const failed = await marketplace.listResource('provider-a', { gpu: -1, cpu: 1, ram: 1, hourlyRate: 1n });
      expect(errorCode(failed)).toBe(RuntimeErrorCodes.VALIDATION_ERROR);

      expect(unwrap(await marketplace.listResource('provider-a', { gpu: 1, cpu: 1, ram: 1, hourlyRate: 1n }))).toBe(1);
    });
  });

  describe('auctions', () => {
    it('reports typed failures without changing state', async () => {
      unwrap(await marketplace.depositFunds('alice', 100n));
      const auctionId = unwrap(
        await marketplace.createAuction('requester', { requirements: REQUIREMENTS, maxDuration: 24, startingPrice: 50n }),
      );

      expect(errorCode(await marketplace.placeBid('alice', auctionId, 150n))).toBe(
        RuntimeErrorCodes.INSUFFICIENT_BALANCE,
      );
      expect(errorCode(await marketplace.placeBid('alice', 99, 60n))).toBe(RuntimeErrorCodes.AUCTION_NOT_FOUND);
      expect(errorCode(await marketplace.endAuction('anyone', auctionId))).toBe(RuntimeErrorCodes.AUCTION_ACTIVE);
      expect(await marketplace.getUserBalance('alice')).toBe(100n);
      expect(await marketplace.isAuctionActive(auctionId)).toBe(true);
    });

    it('settles into a job with three milestones', async () => {
      const jobId = await settledJob();

      expect(jobId).toBe(1);
      expect(await marketplace.getAuctionPhase(1)).toBe('settled');
      expect(await marketplace.isAuctionActive(1)).toBe(false);
      expect((await marketplace.getJobEscrow(jobId)).map((entry) => entry.amount)).toEqual([66n, 66n, 68n]);
      expect((await marketplace.getEscrowBalance(jobId, 3))?.amount).toBe(68n);
      expect(await marketplace.getLockedEscrow(jobId)).toBe(200n);
    });

    it('returns job id 0 when nobody bid', async () => {
      const auctionId = unwrap(
        await marketplace.createAuction('requester', { requirements: REQUIREMENTS, maxDuration: 1, startingPrice: 1n }),
      );
      clock.advance(144);

      expect(unwrap(await marketplace.endAuction('anyone', auctionId))).toBe(0);
      expect(await marketplace.getJob(0)).toBeNull();
      expect(await marketplace.getAuctionPhase(auctionId)).toBe('unsettled');
    });
  });

  describe('jobs', () => {
    it('accepts a proof from the provider only', async () => {
      const jobId = await settledJob();

      expect(errorCode(await marketplace.submitExecutionProof('requester', jobId, 'hash'))).toBe(
        RuntimeErrorCodes.NOT_AUTHORIZED,
      );
      expect(errorCode(await marketplace.submitExecutionProof('bob', jobId, '   '))).toBe(
        RuntimeErrorCodes.VALIDATION_ERROR,
      );

      const job = unwrap(await marketplace.submitExecutionProof('bob', jobId, 'hash'));
      expect(job.status).toBe('completed');
      expect(errorCode(await marketplace.submitExecutionProof('bob', jobId, 'again'))).toBe(
        RuntimeErrorCodes.ALREADY_COMPLETED,
      );
    });

    it('releases milestones to the provider', async () => {
      const jobId = await settledJob();

      const release = unwrap(await marketplace.releaseMilestone('requester', jobId, 1));

      expect(release.providerPayment).toBe(65n);
      expect(await marketplace.getUserBalance('bob')).toBe(365n);
      expect(await marketplace.getPlatformTreasury()).toBe(1n);
      expect(errorCode(await marketplace.releaseMilestone('requester', jobId, 1))).toBe(
        RuntimeErrorCodes.ALREADY_COMPLETED,
      );
      expect(errorCode(await marketplace.releaseMilestone('requester', 7, 1))).toBe(RuntimeErrorCodes.JOB_NOT_FOUND);
    });
  });

  describe('funds', () => {
    it('deposits and withdraws through the rail', async () => {
      expect(unwrap(await marketplace.depositFunds('alice', 300n))).toBe(300n);
      expect(unwrap(await marketplace.withdrawFunds('alice', 100n))).toBe(200n);

      expect(rail.balanceOf('alice')).toBe(800n);
      expect(rail.balanceOf('marketplace:custody')).toBe(200n);
    });

    it('rejects an over-balance withdrawal', async () => {
      unwrap(await marketplace.depositFunds('alice', 50n));

      const result = await marketplace.withdrawFunds('alice', 51n);

      expect(errorCode(result)).toBe(RuntimeErrorCodes.INSUFFICIENT_BALANCE);
      expect(await marketplace.getUserBalance('alice')).toBe(50n);
      expect(rail.balanceOf('alice')).toBe(950n);
    });

    it('reports a failed rail transfer and rolls back', async () => {
      const result = await marketplace.depositFunds('carol', 10n);

      expect(errorCode(result)).toBe(RuntimeErrorCodes.TRANSFER_FAILED);
      expect(await marketplace.getUserBalance('carol')).toBe(0n);
    });

    it('rejects non-positive amounts', async () => {
      expect(errorCode(await marketplace.depositFunds('alice', 0n))).toBe(RuntimeErrorCodes.VALIDATION_ERROR);
      expect(errorCode(await marketplace.withdrawFunds('alice', -5n))).toBe(RuntimeErrorCodes.VALIDATION_ERROR);
    });

    it('serializes concurrent operations', async () => {
      unwrap(await marketplace.depositFunds('alice', 100n));

      const results = await Promise.all([
        marketplace.withdrawFunds('alice', 60n),
        marketplace.withdrawFunds('alice', 60n),
      ]);

      expect(results.map(errorCode)).toEqual([null, RuntimeErrorCodes.INSUFFICIENT_BALANCE]);
      expect(await marketplace.getUserBalance('alice')).toBe(40n);
    });

    it('rethrows errors that are not marketplace errors', async () => {
      const brokenClock = {
        currentHeight: (): number => {
          throw new Error('clock unavailable');
        },
      };
      const broken = new ComputeMarketplace({ clock: brokenClock });

      await expect(
        broken.listResource('provider-a', { gpu: 1, cpu: 1, ram: 1, hourlyRate: 1n }),
      ).rejects.toThrow('clock unavailable');
      expect(await broken.getResource(1)).toBeNull();
    });
  });

  describe('events', () => {
    it('publishes committed operations only', async () => {
      const events: MarketplaceEvent[] = [];
      marketplace.subscribe((event) => events.push(event));

      await marketplace.depositFunds('alice', 10n);
      await marketplace.withdrawFunds('alice', 20n);

      expect(events).toEqual([
        { type: 'fundsDeposited', height: 10, user: 'alice', amount: 10n, balance: 10n },
      ]);
    });

    it('keeps operating when a subscriber throws', async () => {
      const handler = vi.fn(() => {
        throw new Error('subscriber bug');
      });
      marketplace.subscribe(handler);

      expect(unwrap(await marketplace.depositFunds('alice', 5n))).toBe(5n);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('emits auctionEnded then jobCreated at settlement', async () => {
      const types: string[] = [];
      marketplace.subscribe((event) => types.push(event.type));

      await settledJob();

      expect(types).toEqual(['fundsDeposited', 'auctionCreated', 'bidPlaced', 'auctionEnded', 'jobCreated']);
    });

    it('emits one reputation update when the job settles', async () => {
      const jobId = await settledJob();
      const updates = vi.fn();
      marketplace.on('reputationUpdated', updates);

      for (const index of [1, 2, 3]) {
        unwrap(await marketplace.releaseMilestone('requester', jobId, index));
      }

      expect(updates).toHaveBeenCalledTimes(1);
      expect(updates).toHaveBeenCalledWith({
        type: 'reputationUpdated',
        height: 154,
        provider: 'bob',
        score: 100,
        completedJobs: 1,
        totalJobs: 1,
      });
    });
  });

  describe('verifyJobProof', () => {
    it('fails without a proof or a verifier', async () => {
      const jobId = await settledJob();

      expect(errorCode(await marketplace.verifyJobProof(jobId))).toBe(RuntimeErrorCodes.INVALID_PROOF);
      unwrap(await marketplace.submitExecutionProof('bob', jobId, 'hash'));
      expect(errorCode(await marketplace.verifyJobProof(jobId))).toBe(RuntimeErrorCodes.INVALID_PROOF);
      expect(errorCode(await marketplace.verifyJobProof(42))).toBe(RuntimeErrorCodes.JOB_NOT_FOUND);
    });

    it('returns the verifier verdict without changing the job', async () => {
      const verifier: ExecutionVerifier = { verifyExecution: vi.fn().mockResolvedValue(false) };
      marketplace.registerVerifier(verifier);
      const jobId = await settledJob();
      unwrap(await marketplace.submitExecutionProof('bob', jobId, 'hash'));

      expect(unwrap(await marketplace.verifyJobProof(jobId))).toBe(false);
      expect(verifier.verifyExecution).toHaveBeenCalledWith('hash');
      expect((await marketplace.getJob(jobId))?.status).toBe('completed');
      expect(marketplace.executionVerifier).toBe(verifier);
    });

    it('maps a throwing verifier to InvalidProof', async () => {
      marketplace.registerVerifier({ verifyExecution: vi.fn().mockRejectedValue(new Error('timeout')) });
      const jobId = await settledJob();
      unwrap(await marketplace.submitExecutionProof('bob', jobId, 'hash'));

      const result = await marketplace.verifyJobProof(jobId);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid execution proof for job 1: timeout');
      }
    });
  });

  it('trims principals in queries the same way as in operations', async () => {
    unwrap(await marketplace.depositFunds(' alice', 40n));
    unwrap(await marketplace.listResource('provider-a ', { gpu: 1, cpu: 1, ram: 1, hourlyRate: 1n }));

    expect(await marketplace.getUserBalance(' alice')).toBe(40n);
    expect(await marketplace.getUserBalance('alice ')).toBe(40n);
    expect((await marketplace.listResourcesByProvider(' provider-a')).map((r) => r.resourceId)).toEqual([1]);
    expect((await marketplace.getProviderReputation(' nobody ')).provider).toBe('nobody');
  });

  it('rejects the custody account as caller of any operation', async () => {
    const result = await marketplace.listResource(' marketplace:custody', {
      gpu: 1,
      cpu: 1,
      ram: 1,
      hourlyRate: 1n,
    });

    expect(errorCode(result)).toBe(RuntimeErrorCodes.NOT_AUTHORIZED);
    expect(await marketplace.getResource(1)).toBeNull();
  });

  it('reports neutral reputation for unknown providers', async () => {
    expect((await marketplace.getProviderReputation('nobody')).score).toBe(50);
  });
});
