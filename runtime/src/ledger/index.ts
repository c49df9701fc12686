/**
 * Account ledger module.
 *
 * @module
 */

export { AccountLedger, type AccountLedgerConfig } from './account-ledger.js';
