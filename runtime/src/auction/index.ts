/**
 * Auction engine module.
 *
 * @module
 */

export { AuctionEngine, type AuctionEngineConfig } from './engine.js';

export {
  NO_JOB_ID,
  type Auction,
  type AuctionPhase,
  type CreateAuctionInput,
  type EndAuctionResult,
  type PlaceBidResult,
  type ResourceRequirements,
} from './types.js';
