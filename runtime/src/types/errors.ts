/**
 * Error types and utilities for @gridmarket/runtime
 *
 * Every failure a marketplace entry point can report is a RuntimeError
 * subclass carrying a stable string code. Components throw these; the
 * marketplace facade converts them into typed results after rolling the
 * transaction back.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * String error codes for marketplace failures.
 */
export const RuntimeErrorCodes = {
  /** Caller is not the principal allowed to perform the operation */
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  /** Compute resource id is unknown */
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',
  /** Auction id is unknown */
  AUCTION_NOT_FOUND: 'AUCTION_NOT_FOUND',
  /** Auction reached its end height or was already ended */
  AUCTION_ENDED: 'AUCTION_ENDED',
  /** Auction has not reached its end height yet */
  AUCTION_ACTIVE: 'AUCTION_ACTIVE',
  /** Bid does not strictly exceed the current bid */
  BID_TOO_LOW: 'BID_TOO_LOW',
  /** Account balance does not cover the requested amount */
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  /** Job id is unknown */
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  /** Execution proof missing or rejected by the verifier */
  INVALID_PROOF: 'INVALID_PROOF',
  /** Milestone escrow entry is absent or out of range */
  MILESTONE_NOT_READY: 'MILESTONE_NOT_READY',
  /** Terminal transition was already applied */
  ALREADY_COMPLETED: 'ALREADY_COMPLETED',
  /** Input validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** External token transfer failed */
  TRANSFER_FAILED: 'TRANSFER_FAILED',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all runtime errors.
 *
 * @example
 * ```typescript
 * throw new RuntimeError('Something went wrong', RuntimeErrorCodes.VALIDATION_ERROR);
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Runtime Error Classes
// ============================================================================

/**
 * Error thrown when the caller is not the principal an operation requires.
 *
 * @example
 * ```typescript
 * if (caller !== job.provider) {
 *   throw new NotAuthorizedError(caller, 'submit proof for job 4');
 * }
 * ```
 */
export class NotAuthorizedError extends RuntimeError {
  /** Principal that attempted the operation */
  public readonly caller: string;
  /** Short description of the attempted action */
  public readonly action: string;

  constructor(caller: string, action: string) {
    super(`"${caller}" is not authorized to ${action}`, RuntimeErrorCodes.NOT_AUTHORIZED);
    this.name = 'NotAuthorizedError';
    this.caller = caller;
    this.action = action;
  }
}

export class ResourceNotFoundError extends RuntimeError {
  public readonly resourceId: number;

  constructor(resourceId: number) {
    super(`Resource ${resourceId} not found`, RuntimeErrorCodes.RESOURCE_NOT_FOUND);
    this.name = 'ResourceNotFoundError';
    this.resourceId = resourceId;
  }
}

export class AuctionNotFoundError extends RuntimeError {
  public readonly auctionId: number;

  constructor(auctionId: number) {
    super(`Auction ${auctionId} not found`, RuntimeErrorCodes.AUCTION_NOT_FOUND);
    this.name = 'AuctionNotFoundError';
    this.auctionId = auctionId;
  }
}

/**
 * Error thrown when a bid arrives at or after an auction's end height,
 * or after the auction has been ended.
 */
export class AuctionEndedError extends RuntimeError {
  public readonly auctionId: number;
  public readonly endHeight: number;

  constructor(auctionId: number, endHeight: number) {
    super(
      `Auction ${auctionId} is closed for bidding (end height ${endHeight})`,
      RuntimeErrorCodes.AUCTION_ENDED,
    );
    this.name = 'AuctionEndedError';
    this.auctionId = auctionId;
    this.endHeight = endHeight;
  }
}

/**
 * Error thrown when settlement is attempted before the end height.
 */
export class AuctionActiveError extends RuntimeError {
  public readonly auctionId: number;
  /** Blocks left until the auction can be ended */
  public readonly remainingBlocks: number;

  constructor(auctionId: number, remainingBlocks: number) {
    super(
      `Auction ${auctionId} is still active for ${remainingBlocks} block(s)`,
      RuntimeErrorCodes.AUCTION_ACTIVE,
    );
    this.name = 'AuctionActiveError';
    this.auctionId = auctionId;
    this.remainingBlocks = remainingBlocks;
  }
}

export class BidTooLowError extends RuntimeError {
  public readonly amount: bigint;
  public readonly currentBid: bigint;

  constructor(amount: bigint, currentBid: bigint) {
    super(
      `Bid ${amount} must exceed current bid ${currentBid}`,
      RuntimeErrorCodes.BID_TOO_LOW,
    );
    this.name = 'BidTooLowError';
    this.amount = amount;
    this.currentBid = currentBid;
  }
}

/**
 * Error thrown when a debit exceeds the account's custodial balance.
 *
 * @example
 * ```typescript
 * if (balance < amount) {
 *   throw new InsufficientBalanceError(user, amount, balance);
 * }
 * ```
 */
export class InsufficientBalanceError extends RuntimeError {
  public readonly user: string;
  public readonly required: bigint;
  public readonly available: bigint;

  constructor(user: string, required: bigint, available: bigint) {
    super(
      `Insufficient balance for "${user}": required ${required}, available ${available}`,
      RuntimeErrorCodes.INSUFFICIENT_BALANCE,
    );
    this.name = 'InsufficientBalanceError';
    this.user = user;
    this.required = required;
    this.available = available;
  }
}

export class JobNotFoundError extends RuntimeError {
  public readonly jobId: number;

  constructor(jobId: number) {
    super(`Job ${jobId} not found`, RuntimeErrorCodes.JOB_NOT_FOUND);
    this.name = 'JobNotFoundError';
    this.jobId = jobId;
  }
}

export class InvalidProofError extends RuntimeError {
  public readonly jobId: number;
  public readonly reason: string;

  constructor(jobId: number, reason: string) {
    super(`Invalid execution proof for job ${jobId}: ${reason}`, RuntimeErrorCodes.INVALID_PROOF);
    this.name = 'InvalidProofError';
    this.jobId = jobId;
    this.reason = reason;
  }
}

export class MilestoneNotReadyError extends RuntimeError {
  public readonly jobId: number;
  public readonly milestoneIndex: number;

  constructor(jobId: number, milestoneIndex: number) {
    super(
      `Milestone ${milestoneIndex} of job ${jobId} is not ready for release`,
      RuntimeErrorCodes.MILESTONE_NOT_READY,
    );
    this.name = 'MilestoneNotReadyError';
    this.jobId = jobId;
    this.milestoneIndex = milestoneIndex;
  }
}

/**
 * Error thrown when a one-shot transition (auction end, proof submission,
 * milestone release) has already happened.
 */
export class AlreadyCompletedError extends RuntimeError {
  constructor(subject: string) {
    super(`${subject} is already completed`, RuntimeErrorCodes.ALREADY_COMPLETED);
    this.name = 'AlreadyCompletedError';
  }
}

/**
 * Error thrown when input validation fails.
 *
 * @example
 * ```typescript
 * if (amount <= 0n) {
 *   throw new ValidationError('Deposit amount must be positive');
 * }
 * ```
 */
export class ValidationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the external token rail rejects a transfer.
 */
export class TransferFailedError extends RuntimeError {
  public readonly amount: bigint;
  public readonly from: string;
  public readonly to: string;
  public readonly reason: string;

  constructor(amount: bigint, from: string, to: string, reason: string) {
    super(
      `Transfer of ${amount} from "${from}" to "${to}" failed: ${reason}`,
      RuntimeErrorCodes.TRANSFER_FAILED,
    );
    this.name = 'TransferFailedError';
    this.amount = amount;
    this.from = from;
    this.to = to;
    this.reason = reason;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Type guard for RuntimeError, optionally narrowed to one code.
 *
 * @example
 * ```typescript
 * if (isRuntimeError(err, RuntimeErrorCodes.BID_TOO_LOW)) {
 *   // raise the bid and resubmit
 * }
 * ```
 */
export function isRuntimeError(error: unknown, code?: RuntimeErrorCode): error is RuntimeError {
  if (!(error instanceof RuntimeError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Validate that a value is a non-negative bigint amount.
 *
 * @throws ValidationError if the amount is negative
 */
export function validateAmount(value: bigint, name: string): void {
  if (value < 0n) {
    throw new ValidationError(`${name} must be non-negative (got ${value})`);
  }
}

/**
 * Validate that a value is a strictly positive bigint amount.
 *
 * @throws ValidationError if the amount is zero or negative
 */
export function validatePositiveAmount(value: bigint, name: string): void {
  if (value <= 0n) {
    throw new ValidationError(`${name} must be greater than zero (got ${value})`);
  }
}

/**
 * Validate a non-negative integer (ids, heights, capacities).
 *
 * @throws ValidationError if the value is not a non-negative safe integer
 */
export function validateNonNegativeInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer (got ${value})`);
  }
}
