/**
 * @gridmarket/runtime - compute auction marketplace engine
 *
 * Providers list hardware, requesters auction jobs, the winning bid is
 * escrowed across milestones and released to the provider on approval.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Facade
export {
  ComputeMarketplace,
  ok,
  fail,
  type MarketplaceResult,
  type CustodySummary,
} from './marketplace/index.js';

// Components
export * from './auction/index.js';
export * from './escrow/index.js';
export * from './ledger/index.js';
export * from './registry/index.js';
export * from './reputation/index.js';
export * from './treasury/index.js';
export * from './state/index.js';

// Collaborators
export * from './adapters/index.js';

// Events
export {
  MarketplaceEventBus,
  isEventOfType,
  type MarketplaceEvent,
  type MarketplaceEventType,
  type MarketplaceEventOf,
  type MarketplaceEventHandler,
  type ResourceListedEvent,
  type AuctionCreatedEvent,
  type BidPlacedEvent,
  type AuctionEndedEvent,
  type JobCreatedEvent,
  type ProofSubmittedEvent,
  type MilestoneReleasedEvent,
  type ReputationUpdatedEvent,
  type FundsDepositedEvent,
  type FundsWithdrawnEvent,
} from './events/marketplace.js';

// Errors
export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  RuntimeError,
  NotAuthorizedError,
  ResourceNotFoundError,
  AuctionNotFoundError,
  AuctionEndedError,
  AuctionActiveError,
  BidTooLowError,
  InsufficientBalanceError,
  JobNotFoundError,
  InvalidProofError,
  MilestoneNotReadyError,
  AlreadyCompletedError,
  ValidationError,
  TransferFailedError,
  isRuntimeError,
} from './types/errors.js';

// Configuration
export {
  DEFAULT_AUCTION_DURATION,
  DEFAULT_FEE_RATE_PERMILLE,
  DEFAULT_CUSTODY_ACCOUNT,
  JOB_MILESTONE_COUNT,
  resolveMarketplaceConfig,
  loadMarketplaceConfigFromEnv,
  type MarketplaceConfig,
  type ResolvedMarketplaceConfig,
} from './types/config.js';

// Utilities
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
