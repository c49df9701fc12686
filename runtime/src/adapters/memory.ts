/**
 * In-process collaborator implementations for tests, simulations and
 * single-node deployments.
 *
 * @module
 */

import { validateNonNegativeInteger, ValidationError } from '../types/errors.js';
import type { BlockClock, TokenTransferRail } from './types.js';

/**
 * Block clock whose height is moved by hand.
 *
 * @example
 * ```typescript
 * const clock = new ManualBlockClock(100);
 * clock.advance(144);
 * clock.currentHeight(); // 244
 * ```
 */
export class ManualBlockClock implements BlockClock {
  private height: number;

  constructor(initialHeight = 0) {
    validateNonNegativeInteger(initialHeight, 'initialHeight');
    this.height = initialHeight;
  }

  currentHeight(): number {
    return this.height;
  }

  advance(blocks = 1): number {
    validateNonNegativeInteger(blocks, 'blocks');
    this.height += blocks;
    return this.height;
  }

  /** Move to an absolute height. Heights never go backwards. */
  setHeight(height: number): void {
    validateNonNegativeInteger(height, 'height');
    if (height < this.height) {
      throw new ValidationError(`height ${height} is below current height ${this.height}`);
    }
    this.height = height;
  }
}

/**
 * Token rail over in-memory wallet balances.
 *
 * Wallets are external to the marketplace ledger: a deposit moves tokens
 * from the user's wallet to the custody wallet, a withdrawal moves them
 * back.
 */
export class InMemoryTransferRail implements TokenTransferRail {
  private readonly wallets = new Map<string, bigint>();
  private readonly history: Array<{ amount: bigint; from: string; to: string }> = [];

  /** Mint tokens into a wallet. */
  fund(owner: string, amount: bigint): void {
    if (amount < 0n) {
      throw new ValidationError('fund amount must be non-negative');
    }
    this.wallets.set(owner, this.balanceOf(owner) + amount);
  }

  balanceOf(owner: string): bigint {
    return this.wallets.get(owner) ?? 0n;
  }

  /** Completed transfers, oldest first. */
  transfers(): ReadonlyArray<{ amount: bigint; from: string; to: string }> {
    return this.history.map((entry) => ({ ...entry }));
  }

  async transfer(amount: bigint, from: string, to: string): Promise<void> {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new Error(`wallet "${from}" holds ${available}, cannot send ${amount}`);
    }
    this.wallets.set(from, available - amount);
    this.wallets.set(to, this.balanceOf(to) + amount);
    this.history.push({ amount, from, to });
  }
}
