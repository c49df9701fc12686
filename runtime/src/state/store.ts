/**
 * Marketplace state and its transaction boundary.
 *
 * All entities live in one {@link MarketplaceState}. Operations mutate it
 * inside {@link StateStore.transact} / {@link StateStore.transactAsync};
 * when the callback throws, the pre-call snapshot is restored so a failed
 * operation leaves nothing behind.
 *
 * Isolation comes from the caller: the marketplace facade runs one
 * operation at a time. Two concurrent `transactAsync` calls on the same
 * store are rejected.
 *
 * @module
 */

import type { Auction } from '../auction/types.js';
import type { EscrowEntry, Job } from '../escrow/types.js';
import type { ComputeResource } from '../registry/types.js';
import type { ReputationRecord } from '../reputation/types.js';

/** Entity kinds with their own id sequence. */
export type SequenceName = 'resource' | 'auction' | 'job';

export interface MarketplaceState {
  resources: Map<number, ComputeResource>;
  auctions: Map<number, Auction>;
  jobs: Map<number, Job>;
  /** Keyed by `escrowKey(jobId, milestoneIndex)` */
  escrow: Map<string, EscrowEntry>;
  reputation: Map<string, ReputationRecord>;
  balances: Map<string, bigint>;
  treasury: bigint;
  /** Last id handed out per sequence; 0 means none yet */
  sequences: Record<SequenceName, number>;
}

export function createEmptyState(): MarketplaceState {
  return {
    resources: new Map(),
    auctions: new Map(),
    jobs: new Map(),
    escrow: new Map(),
    reputation: new Map(),
    balances: new Map(),
    treasury: 0n,
    sequences: { resource: 0, auction: 0, job: 0 },
  };
}

export class StateStore {
  private current: MarketplaceState;
  private depth = 0;
  private asyncInFlight = false;

  constructor(initial: MarketplaceState = createEmptyState()) {
    this.current = initial;
  }

  get state(): MarketplaceState {
    return this.current;
  }

  /** Deep copy of the current state. */
  snapshot(): MarketplaceState {
    return structuredClone(this.current);
  }

  /**
   * Run `fn` atomically. Nested calls join the outermost transaction.
   */
  transact<T>(fn: (state: MarketplaceState) => T): T {
    if (this.depth > 0) {
      return fn(this.current);
    }

    const before = this.snapshot();
    this.depth += 1;
    try {
      return fn(this.current);
    } catch (err) {
      this.current = before;
      throw err;
    } finally {
      this.depth -= 1;
    }
  }

  /**
   * Async variant for operations that await an external collaborator
   * between ledger mutations.
   */
  async transactAsync<T>(fn: (state: MarketplaceState) => Promise<T>): Promise<T> {
    if (this.depth > 0 || this.asyncInFlight) {
      throw new Error('StateStore: async transaction started while another transaction is open');
    }

    const before = this.snapshot();
    this.asyncInFlight = true;
    this.depth += 1;
    try {
      return await fn(this.current);
    } catch (err) {
      this.current = before;
      throw err;
    } finally {
      this.depth -= 1;
      this.asyncInFlight = false;
    }
  }

  /** Allocate the next id of a sequence (first id is 1). */
  nextId(sequence: SequenceName): number {
    this.current.sequences[sequence] += 1;
    return this.current.sequences[sequence];
  }
}
