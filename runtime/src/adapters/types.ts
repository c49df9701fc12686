/**
 * Collaborator contracts the marketplace core consumes but does not own:
 * the ledger clock, the fungible-token rail and the proof verification
 * oracle.
 *
 * @module
 */

/**
 * Source of the monotonic block height.
 *
 * The auction engine reads it once per operation; the value must not
 * decrease between calls.
 */
export interface BlockClock {
  currentHeight(): number;
}

/**
 * Fungible-token transfer primitive backing deposits and withdrawals.
 *
 * Resolves when the transfer is final; rejects (with any error) when it
 * failed and moved nothing.
 */
export interface TokenTransferRail {
  transfer(amount: bigint, from: string, to: string): Promise<void>;
}

/**
 * Optional execution verification capability.
 *
 * Registered on the marketplace for external collaborators; no core flow
 * invokes it.
 */
export interface ExecutionVerifier {
  verifyExecution(proof: string): Promise<boolean>;
}
