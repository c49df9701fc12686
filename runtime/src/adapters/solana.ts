/**
 * Solana-backed collaborators: slot height as the block clock and native
 * SOL transfers as the token rail.
 *
 * Principals handled by these adapters are base58 public keys.
 *
 * @module
 */

import {
  PublicKey,
  SystemProgram,
  Transaction,
  sendAndConfirmTransaction,
  type Commitment,
  type Connection,
  type Keypair,
} from '@solana/web3.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { ValidationError } from '../types/errors.js';
import type { BlockClock, TokenTransferRail } from './types.js';

/**
 * Block clock fed by `connection.getSlot()`.
 *
 * `currentHeight()` is synchronous, so the slot is cached; call
 * {@link SolanaSlotClock.refresh} before each batch of operations.
 */
export class SolanaSlotClock implements BlockClock {
  private slot: number;

  private constructor(
    private readonly connection: Connection,
    private readonly commitment: Commitment,
    initialSlot: number,
  ) {
    this.slot = initialSlot;
  }

  static async create(connection: Connection, commitment: Commitment = 'confirmed'): Promise<SolanaSlotClock> {
    const slot = await connection.getSlot(commitment);
    return new SolanaSlotClock(connection, commitment, slot);
  }

  currentHeight(): number {
    return this.slot;
  }

  /** Fetch the latest slot. A lagging RPC node never moves the height back. */
  async refresh(): Promise<number> {
    const slot = await this.connection.getSlot(this.commitment);
    if (slot > this.slot) {
      this.slot = slot;
    }
    return this.slot;
  }
}

export interface SolanaTransferRailConfig {
  /** Keypair holding the marketplace's custodial funds */
  custody: Keypair;
  /**
   * Resolve the signer for a depositing user. Deposits fail when the user
   * has no signer available.
   */
  resolveSigner?: (principal: string) => Keypair | undefined;
  logger?: Logger;
}

/**
 * Token rail moving native SOL with `SystemProgram.transfer`.
 *
 * Withdrawals are signed by the custody keypair; deposits by the
 * depositing user's keypair.
 *
 * @example
 * ```typescript
 * const rail = new SolanaTransferRail(connection, { custody, resolveSigner });
 * const marketplace = new ComputeMarketplace({
 *   transferRail: rail,
 *   custodyAccount: rail.custodyAccount,
 * });
 * ```
 */
export class SolanaTransferRail implements TokenTransferRail {
  private readonly connection: Connection;
  private readonly custody: Keypair;
  private readonly resolveSigner: (principal: string) => Keypair | undefined;
  private readonly logger: Logger;

  constructor(connection: Connection, config: SolanaTransferRailConfig) {
    this.connection = connection;
    this.custody = config.custody;
    this.resolveSigner = config.resolveSigner ?? (() => undefined);
    this.logger = config.logger ?? silentLogger;
  }

  /** Principal string of the custody wallet. */
  get custodyAccount(): string {
    return this.custody.publicKey.toBase58();
  }

  async transfer(amount: bigint, from: string, to: string): Promise<void> {
    if (amount <= 0n) {
      throw new ValidationError('Transfer amount must be greater than zero');
    }

    const fromPubkey = parsePublicKey(from);
    const toPubkey = parsePublicKey(to);
    const signer = this.signerFor(from);

    const transaction = new Transaction().add(
      SystemProgram.transfer({
        fromPubkey,
        toPubkey,
        lamports: amount,
      }),
    );

    const signature = await sendAndConfirmTransaction(this.connection, transaction, [signer]);
    this.logger.info(`Transferred ${amount} lamports ${from} -> ${to}: ${signature}`);
  }

  private signerFor(principal: string): Keypair {
    if (principal === this.custodyAccount) {
      return this.custody;
    }
    const signer = this.resolveSigner(principal);
    if (!signer) {
      throw new ValidationError(`No signer available for ${principal}`);
    }
    return signer;
  }
}

function parsePublicKey(value: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch {
    throw new ValidationError(`Invalid Solana address: ${value}`);
  }
}
