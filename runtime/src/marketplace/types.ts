/**
 * Marketplace facade types.
 *
 * @module
 */

import type { RuntimeError } from '../types/errors.js';

/**
 * Outcome of a marketplace operation. Failures carry the typed error the
 * operation was rejected with; a failed operation changed nothing.
 */
export type MarketplaceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RuntimeError };

export function ok<T>(value: T): MarketplaceResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: RuntimeError): MarketplaceResult<T> {
  return { ok: false, error };
}

/**
 * Where every lamport the marketplace holds in custody currently sits.
 * `total` always equals net deposits (deposits minus withdrawals).
 */
export interface CustodySummary {
  /** Spendable custodial balances */
  balances: bigint;
  /** Winning bids of auctions that have not ended */
  heldBids: bigint;
  /** Unreleased milestone escrow */
  lockedEscrow: bigint;
  /** Accrued platform fees */
  treasury: bigint;
  total: bigint;
}
