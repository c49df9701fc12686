/**
 * Collaborator contracts and their implementations.
 *
 * @module
 */

export type { BlockClock, ExecutionVerifier, TokenTransferRail } from './types.js';
export { ManualBlockClock, InMemoryTransferRail } from './memory.js';
export { SolanaSlotClock, SolanaTransferRail, type SolanaTransferRailConfig } from './solana.js';
