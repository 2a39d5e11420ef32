import type { Logger } from 'pino';
import type {
  BlockRecord,
  BlockVersion,
  LedgerStore,
  OutputLocator,
  StoreStatus,
  TransactionOutput,
  UnspentOutput,
  UnspentSelection
} from '@shared/blockchain.js';
import { logger as rootLogger } from '@config/logger.js';
import { UnknownVersionError } from '@services/errors.js';
import type { LedgerDatabase, SqlExecutor } from './connection.js';
import { blockEffects } from './block-effects.js';
import { BlockRepository } from './repositories/block-repository.js';
import { ChainStateRepository } from './repositories/chain-state-repository.js';
import { OutputRepository } from './repositories/output-repository.js';
import { UnspentOutputRepository } from './repositories/unspent-output-repository.js';

/**
 * Ledger Store backed by PostgreSQL. Selection and spend marking run in
 * database transactions; selection locks the candidate rows with
 * `SELECT ... FOR UPDATE`.
 */
export class PostgresLedgerStore implements LedgerStore {
  private readonly blocks: BlockRepository;
  private readonly outputs: OutputRepository;
  private readonly unspent: UnspentOutputRepository;
  private readonly chainState: ChainStateRepository;
  private readonly log: Logger;

  constructor(
    private readonly db: LedgerDatabase,
    private readonly walletAddress: string,
    log: Logger = rootLogger
  ) {
    this.blocks = new BlockRepository(db);
    this.outputs = new OutputRepository(db);
    this.unspent = new UnspentOutputRepository(db);
    this.chainState = new ChainStateRepository(db);
    this.log = log.child({ module: 'postgres-ledger-store' });
  }

  async getUnspentCovering(amount: number): Promise<UnspentSelection> {
    const selection = await this.db.transaction(tx => this.unspent.reserveCovering(amount, tx));
    this.log.debug({ amount, selected: selection.outputs.length, total: selection.total }, 'Reserved unspent outputs');
    return selection;
  }

  async releaseOutputs(outputs: UnspentOutput[]): Promise<void> {
    if (outputs.length === 0) {
      return;
    }
    await this.db.transaction(tx => this.unspent.release(outputs, tx));
  }

  async markSpent(locator: OutputLocator, spendingTransactionId: string): Promise<void> {
    await this.db.transaction(async tx => {
      await this.outputs.markSpent(locator, spendingTransactionId, tx);
      await this.unspent.remove(locator, tx);
    });
  }

  async findOutput(locator: OutputLocator): Promise<TransactionOutput | null> {
    return this.outputs.find(locator);
  }

  async appendBlock(block: BlockRecord): Promise<string> {
    await this.db.transaction(tx => this.archive(block, tx));
    return block.block_id;
  }

  /**
   * Fetch an archived block. Outputs spent since the block was archived carry
   * the id of the spending transaction.
   */
  async getBlock(blockId: string): Promise<BlockRecord | null> {
    const block = await this.blocks.findById(blockId);
    if (!block) {
      return null;
    }

    for (const marker of await this.outputs.findSpentInBlock(blockId)) {
      const output = block.data[marker.transactionId]?.outputs[marker.outputIndex];
      if (output) {
        output.spent_transaction_id = marker.spentTransactionId;
      }
    }
    return block;
  }

  async getTip(): Promise<string> {
    return this.chainState.getTip();
  }

  async setTip(blockId: string): Promise<void> {
    await this.chainState.setTip(blockId);
  }

  async getDifficulty(version: BlockVersion): Promise<number> {
    const difficulty = await this.chainState.getDifficulty(String(version));
    if (difficulty === null) {
      throw new UnknownVersionError(version);
    }
    return difficulty;
  }

  async acceptBlock(block: BlockRecord): Promise<string> {
    const effects = blockEffects(block, this.walletAddress);

    await this.db.transaction(async tx => {
      await this.archive(block, tx);
      for (const spend of effects.spends) {
        await this.outputs.markSpent(spend.locator, spend.spendingTransactionId, tx);
        await this.unspent.remove(spend.locator, tx);
      }
      for (const output of effects.walletOutputs) {
        await this.unspent.add(output, tx);
      }
      await this.chainState.setTip(block.block_id, tx);
    });

    this.log.info(
      { blockId: block.block_id, spends: effects.spends.length, walletOutputs: effects.walletOutputs.length },
      'Block accepted into the ledger'
    );
    return block.block_id;
  }

  async getBalance(): Promise<number> {
    return this.unspent.getSpendableBalance();
  }

  async listUnspent(): Promise<UnspentOutput[]> {
    return this.unspent.listSpendable();
  }

  getStatus(): StoreStatus {
    const { connected, lastError } = this.db.getStatus();
    return { backend: 'postgres', connected, lastError };
  }

  private async archive(block: BlockRecord, tx: SqlExecutor): Promise<void> {
    await this.blocks.save(block, tx);
    await this.outputs.saveBlockOutputs(block, tx);
  }
}
