/**
 * Configuration types for @gridmarket/runtime
 */

import type { BlockClock, ExecutionVerifier, TokenTransferRail } from '../adapters/types.js';
import { ManualBlockClock, InMemoryTransferRail } from '../adapters/memory.js';
import { createLogger, isLogLevel, silentLogger, type Logger } from '../utils/logger.js';
import {
  parseIntegerEnv,
  requireIntRange,
  requireNonEmptyString,
  requirePositiveInteger,
  validationResult,
} from '../utils/validation.js';
import { ValidationError } from './errors.js';

/** Blocks an auction stays open after creation. */
export const DEFAULT_AUCTION_DURATION = 144;

/** Platform fee in parts per thousand (25 = 2.5%). */
export const DEFAULT_FEE_RATE_PERMILLE = 25;

/**
 * Milestones every settled auction is split into. Not configurable:
 * settlement always uses this count.
 */
export const JOB_MILESTONE_COUNT = 3;

/** Ledger principal that holds deposited tokens on the external rail. */
export const DEFAULT_CUSTODY_ACCOUNT = 'marketplace:custody';

/**
 * Marketplace configuration. Every field is optional; see
 * {@link resolveMarketplaceConfig} for defaults.
 */
export interface MarketplaceConfig {
  /** Blocks between auction creation and its end height (default: 144) */
  auctionDuration?: number;
  /** Platform fee per mille taken from each milestone release (default: 25) */
  feeRatePermille?: number;
  /** Rail principal receiving deposits and paying withdrawals */
  custodyAccount?: string;
  /** Block height source (default: a ManualBlockClock at height 0) */
  clock?: BlockClock;
  /** Token rail for deposits and withdrawals (default: InMemoryTransferRail) */
  transferRail?: TokenTransferRail;
  /** Optional proof verifier, exposed to external collaborators only */
  verifier?: ExecutionVerifier;
  /** Logger (defaults to silent) */
  logger?: Logger;
}

export interface ResolvedMarketplaceConfig {
  auctionDuration: number;
  feeRatePermille: number;
  custodyAccount: string;
  clock: BlockClock;
  transferRail: TokenTransferRail;
  verifier: ExecutionVerifier | null;
  logger: Logger;
}

/**
 * Fill defaults and validate a marketplace configuration.
 *
 * @throws ValidationError listing every invalid field
 */
export function resolveMarketplaceConfig(config: MarketplaceConfig = {}): ResolvedMarketplaceConfig {
  const resolved: ResolvedMarketplaceConfig = {
    auctionDuration: config.auctionDuration ?? DEFAULT_AUCTION_DURATION,
    feeRatePermille: config.feeRatePermille ?? DEFAULT_FEE_RATE_PERMILLE,
    custodyAccount: config.custodyAccount ?? DEFAULT_CUSTODY_ACCOUNT,
    clock: config.clock ?? new ManualBlockClock(),
    transferRail: config.transferRail ?? new InMemoryTransferRail(),
    verifier: config.verifier ?? null,
    logger: config.logger ?? silentLogger,
  };

  const errors: string[] = [];
  requirePositiveInteger(resolved.auctionDuration, 'auctionDuration', errors);
  requireIntRange(resolved.feeRatePermille, 'feeRatePermille', 0, 1000, errors);
  requireNonEmptyString(resolved.custodyAccount, 'custodyAccount', errors);

  const result = validationResult(errors);
  if (!result.valid) {
    throw new ValidationError(`Invalid marketplace config: ${result.errors.join('; ')}`);
  }
  return resolved;
}

/**
 * Read the scalar settings from environment variables:
 *
 * - `GRIDMARKET_AUCTION_DURATION`
 * - `GRIDMARKET_FEE_RATE_PERMILLE`
 * - `GRIDMARKET_CUSTODY_ACCOUNT`
 * - `GRIDMARKET_LOG_LEVEL` (creates a console logger when set)
 *
 * Collaborators (clock, rail, verifier) are never read from the
 * environment and must be merged in by the caller.
 *
 * @throws ValidationError for malformed values
 */
export function loadMarketplaceConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): MarketplaceConfig {
  const errors: string[] = [];
  const config: MarketplaceConfig = {};

  const duration = parseIntegerEnv(env.GRIDMARKET_AUCTION_DURATION, 'GRIDMARKET_AUCTION_DURATION', errors);
  if (duration !== undefined) config.auctionDuration = duration;

  const feeRate = parseIntegerEnv(env.GRIDMARKET_FEE_RATE_PERMILLE, 'GRIDMARKET_FEE_RATE_PERMILLE', errors);
  if (feeRate !== undefined) config.feeRatePermille = feeRate;

  const custody = env.GRIDMARKET_CUSTODY_ACCOUNT?.trim();
  if (custody) config.custodyAccount = custody;

  const level = env.GRIDMARKET_LOG_LEVEL?.trim().toLowerCase();
  if (level) {
    if (isLogLevel(level)) {
      config.logger = createLogger(level);
    } else {
      errors.push(`GRIDMARKET_LOG_LEVEL must be one of debug, info, warn, error (got "${level}")`);
    }
  }

  const result = validationResult(errors);
  if (!result.valid) {
    throw new ValidationError(`Invalid marketplace environment: ${result.errors.join('; ')}`);
  }
  return config;
}
