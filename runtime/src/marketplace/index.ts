/**
 * Marketplace facade module.
 *
 * @module
 */

export { ComputeMarketplace } from './compute-marketplace.js';
export { ok, fail, type MarketplaceResult, type CustodySummary } from './types.js';
