/**
 * Platform treasury: a single accumulator of milestone fees.
 *
 * @module
 */

import type { StateStore } from '../state/store.js';
import { validateAmount } from '../types/errors.js';

export class Treasury {
  constructor(private readonly store: StateStore) {}

  balance(): bigint {
    return this.store.state.treasury;
  }

  accrue(amount: bigint): bigint {
    validateAmount(amount, 'fee amount');
    this.store.state.treasury += amount;
    return this.store.state.treasury;
  }
}
