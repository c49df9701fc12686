/**
 * AccountLedger: custodial balances held by the marketplace.
 *
 * Balances are debited by bids and withdrawals and credited by deposits,
 * outbid refunds and milestone payouts. Deposits and withdrawals bridge to
 * the external token rail; the ledger mutation and the transfer commit or
 * roll back together.
 *
 * @module
 */

import type { TokenTransferRail } from '../adapters/types.js';
import type { StateStore } from '../state/store.js';
import {
  InsufficientBalanceError,
  NotAuthorizedError,
  TransferFailedError,
  validateAmount,
  validatePositiveAmount,
} from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { sumBigInt } from '../utils/numeric.js';

export interface AccountLedgerConfig {
  store: StateStore;
  transferRail: TokenTransferRail;
  /** Rail principal that holds deposited tokens */
  custodyAccount: string;
  logger?: Logger;
}

export class AccountLedger {
  private readonly store: StateStore;
  private readonly rail: TokenTransferRail;
  private readonly custodyAccount: string;
  private readonly logger: Logger;

  constructor(config: AccountLedgerConfig) {
    this.store = config.store;
    this.rail = config.transferRail;
    this.custodyAccount = config.custodyAccount;
    this.logger = config.logger ?? silentLogger;
  }

  balanceOf(user: string): bigint {
    return this.store.state.balances.get(user) ?? 0n;
  }

  /** Unconditional balance increase. */
  credit(user: string, amount: bigint): bigint {
    validateAmount(amount, 'credit amount');
    const next = this.balanceOf(user) + amount;
    this.store.state.balances.set(user, next);
    return next;
  }

  /**
   * Decrease a balance.
   *
   * @throws InsufficientBalanceError if the balance is below `amount`
   */
  debit(user: string, amount: bigint): bigint {
    validateAmount(amount, 'debit amount');
    const balance = this.balanceOf(user);
    if (balance < amount) {
      throw new InsufficientBalanceError(user, amount, balance);
    }
    const next = balance - amount;
    this.store.state.balances.set(user, next);
    return next;
  }

  /**
   * Credit the ledger, then pull tokens from the user's wallet into
   * custody. A failed transfer rolls the credit back.
   *
   * @returns the new ledger balance
   */
  async deposit(user: string, amount: bigint): Promise<bigint> {
    validatePositiveAmount(amount, 'deposit amount');
    this.requireExternalUser(user, 'deposit funds');
    return this.store.transactAsync(async () => {
      const balance = this.credit(user, amount);
      await this.transferOrFail(amount, user, this.custodyAccount);
      this.logger.debug(`Deposited ${amount} for ${user}`);
      return balance;
    });
  }

  /**
   * Debit the ledger, then pay tokens out of custody to the user's
   * wallet. A failed transfer rolls the debit back.
   *
   * @throws InsufficientBalanceError if the balance is below `amount`
   * @returns the new ledger balance
   */
  async withdraw(user: string, amount: bigint): Promise<bigint> {
    validatePositiveAmount(amount, 'withdraw amount');
    this.requireExternalUser(user, 'withdraw funds');
    return this.store.transactAsync(async () => {
      const balance = this.debit(user, amount);
      await this.transferOrFail(amount, this.custodyAccount, user);
      this.logger.debug(`Withdrew ${amount} for ${user}`);
      return balance;
    });
  }

  /** Sum of every custodial balance. */
  totalBalances(): bigint {
    return sumBigInt(this.store.state.balances.values());
  }

  /** The custody account cannot fund or drain its own ledger balance. */
  private requireExternalUser(user: string, action: string): void {
    if (user === this.custodyAccount) {
      throw new NotAuthorizedError(user, action);
    }
  }

  private async transferOrFail(amount: bigint, from: string, to: string): Promise<void> {
    try {
      await this.rail.transfer(amount, from, to);
    } catch (err) {
      this.logger.warn(`Transfer of ${amount} ${from} -> ${to} failed: ${toErrorMessage(err)}`);
      throw new TransferFailedError(amount, from, to, toErrorMessage(err));
    }
  }
}
