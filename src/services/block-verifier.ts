import type { Logger } from 'pino';
import type { BlockVerification, LedgerStore } from '@shared/blockchain.js';
import { logger as rootLogger } from '@config/logger.js';
import { meetsDifficulty, type MinedBlock } from '@ledger/block.js';
import { UnknownVersionError } from './errors.js';

export class BlockVerifier {
  private readonly log: Logger;

  constructor(private readonly store: LedgerStore, log: Logger = rootLogger) {
    this.log = log.child({ module: 'block-verifier' });
  }

  /**
   * Check a block's proof of work without touching the ledger: the hash of
   * its payload and nonce must meet the difficulty of its version, and its id
   * must be the hash of its payload.
   */
  async check(block: MinedBlock): Promise<BlockVerification> {
    const payload = block.miningPayload();
    const hash = payload.hashWithNonce(block.miningProof);

    let difficulty: number;
    try {
      difficulty = await this.store.getDifficulty(block.version);
    } catch (error) {
      if (error instanceof UnknownVersionError) {
        return { valid: false, reason: 'unknown_version', hash };
      }
      throw error;
    }

    if (!meetsDifficulty(hash, difficulty)) {
      return { valid: false, reason: 'difficulty_not_met', hash };
    }
    if (payload.blockId() !== block.blockId) {
      return { valid: false, reason: 'block_id_mismatch', hash };
    }
    return { valid: true, hash };
  }

  /**
   * Verify a received block and, when it holds, accept it as the new chain
   * tip. A rejected block leaves the ledger untouched.
   */
  async verify(block: MinedBlock): Promise<BlockVerification> {
    const result = await this.check(block);
    if (!result.valid) {
      this.log.warn({ blockId: block.blockId, reason: result.reason }, 'Block rejected');
      return result;
    }

    await this.store.acceptBlock(block.toRecord());
    this.log.info({ blockId: block.blockId }, 'Block accepted');
    return result;
  }
}
