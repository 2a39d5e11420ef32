import type { Logger } from 'pino';
import type { LedgerStore } from '@shared/blockchain.js';
import type { MiningConfig } from '@config/app.config.js';
import { logger as rootLogger } from '@config/logger.js';
import type { BlockDraft, MinedBlock } from '@ledger/block.js';
import { searchProof } from '@ledger/proof-of-work.js';

export type MiningOutcome =
  | { status: 'mined'; block: MinedBlock; attempts: number }
  | { status: 'stale'; block: MinedBlock; attempts: number }
  | { status: 'cancelled'; attempts: number }
  | { status: 'exhausted'; attempts: number };

/**
 * Persists a freshly mined block and makes it the chain tip. Resolves to
 * `false` when the block can no longer be accepted (the tip moved on).
 */
export type BlockCommitter = (block: MinedBlock) => Promise<boolean>;

export interface BlockMinerOptions {
  log?: Logger;
  clock?: () => Date;
  commit?: BlockCommitter;
}

export class BlockMiner {
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly commit: BlockCommitter;

  constructor(
    private readonly store: LedgerStore,
    private readonly config: MiningConfig,
    options: BlockMinerOptions = {}
  ) {
    this.log = (options.log ?? rootLogger).child({ module: 'block-miner' });
    this.clock = options.clock ?? (() => new Date());
    this.commit = options.commit ?? (async block => {
      await this.store.acceptBlock(block.toRecord());
      return true;
    });
  }

  /**
   * Mine a block: search the lowest nonce meeting the difficulty of the
   * block's version, stamp the block and hand it to the committer. A draft
   * that was already mined is returned as it is.
   */
  async mine(draft: BlockDraft, signal?: AbortSignal): Promise<MiningOutcome> {
    const alreadyMined = draft.getMined();
    if (alreadyMined) {
      return { status: 'mined', block: alreadyMined, attempts: 0 };
    }

    const difficulty = await this.store.getDifficulty(draft.version);
    const payload = draft.miningPayload();

    this.log.info(
      { previousBlockId: draft.previousBlockId, transactions: draft.transactionCount, difficulty },
      'Mining started'
    );

    const outcome = await searchProof(payload, difficulty, {
      maxNonce: this.config.maxNonce,
      checkInterval: this.config.checkInterval,
      signal
    });

    if (outcome.status === 'cancelled') {
      this.log.info({ attempts: outcome.attempts }, 'Mining cancelled');
      return { status: 'cancelled', attempts: outcome.attempts };
    }
    if (outcome.status === 'exhausted') {
      this.log.warn({ attempts: outcome.attempts, maxNonce: this.config.maxNonce }, 'Mining gave up without a proof');
      return { status: 'exhausted', attempts: outcome.attempts };
    }

    const block = draft.complete(outcome.nonce, this.clock());
    const accepted = await this.commit(block);
    if (!accepted) {
      this.log.warn({ blockId: block.blockId }, 'Mined block went stale before it could be accepted');
      return { status: 'stale', block, attempts: outcome.attempts };
    }

    this.log.info(
      { blockId: block.blockId, miningProof: block.miningProof, hash: outcome.hash },
      'Block mined'
    );
    return { status: 'mined', block, attempts: outcome.attempts };
  }
}
