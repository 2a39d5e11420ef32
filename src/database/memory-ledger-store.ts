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
import {
  InsufficientFundsError,
  InvalidBlockError,
  OutputUnavailableError,
  UnknownVersionError
} from '@services/errors.js';
import { fromBaseUnits, sumAmounts, takeCovering } from '@ledger/amounts.js';
import { blockEffects, locatorKey, locatorOf } from './block-effects.js';

interface WalletEntry {
  output: UnspentOutput;
  reserved: boolean;
}

export interface MemoryLedgerStoreOptions {
  walletAddress: string;
  // block version -> difficulty
  versions: Record<string, number>;
  // Outputs the wallet may spend from the start
  unspent?: UnspentOutput[];
  log?: Logger;
}

/**
 * Ledger Store kept in process memory, used by tests and by nodes started
 * with `LEDGER_STORE=memory`. Every method does its checks and its writes
 * without yielding in between, which is what makes them atomic.
 */
export class MemoryLedgerStore implements LedgerStore {
  private readonly walletAddress: string;
  private readonly versions: Map<string, number>;
  private readonly blocks = new Map<string, BlockRecord>();
  private readonly outputs = new Map<string, TransactionOutput>();
  private readonly wallet: WalletEntry[] = [];
  private tip = '';
  private readonly log: Logger;

  constructor(options: MemoryLedgerStoreOptions) {
    this.walletAddress = options.walletAddress;
    this.versions = new Map(Object.entries(options.versions));
    for (const output of options.unspent ?? []) {
      this.wallet.push({ output: { ...output }, reserved: false });
    }
    this.log = (options.log ?? rootLogger).child({ module: 'memory-ledger-store' });
  }

  async getUnspentCovering(amount: number): Promise<UnspentSelection> {
    const spendable = this.wallet.filter(entry => !entry.reserved);
    const { taken, total, covered } = takeCovering(spendable, amount, entry => entry.output.amount);
    if (!covered) {
      throw new InsufficientFundsError(amount, total);
    }

    for (const entry of taken) {
      entry.reserved = true;
    }
    return { total, outputs: taken.map(entry => ({ ...entry.output })) };
  }

  async releaseOutputs(outputs: UnspentOutput[]): Promise<void> {
    const keys = new Set(outputs.map(output => locatorKey(locatorOf(output))));
    for (const entry of this.wallet) {
      if (keys.has(locatorKey(locatorOf(entry.output)))) {
        entry.reserved = false;
      }
    }
  }

  async markSpent(locator: OutputLocator, spendingTransactionId: string): Promise<void> {
    this.spendableOutput(locator).spent_transaction_id = spendingTransactionId;
    this.dropFromWallet(locator);
  }

  async findOutput(locator: OutputLocator): Promise<TransactionOutput | null> {
    const output = this.outputs.get(locatorKey(locator));
    return output ? { ...output } : null;
  }

  async appendBlock(block: BlockRecord): Promise<string> {
    this.assertNotArchived(block.block_id);
    this.archive(block);
    return block.block_id;
  }

  async getBlock(blockId: string): Promise<BlockRecord | null> {
    const block = this.blocks.get(blockId);
    if (!block) {
      return null;
    }

    const copy = structuredClone(block);
    for (const transaction of Object.values(copy.data)) {
      transaction.outputs.forEach((output, outputIndex) => {
        const archived = this.outputs.get(locatorKey({
          transactionId: transaction.transaction_id,
          blockId,
          outputIndex
        }));
        output.spent_transaction_id = archived?.spent_transaction_id ?? output.spent_transaction_id;
      });
    }
    return copy;
  }

  async getTip(): Promise<string> {
    return this.tip;
  }

  async setTip(blockId: string): Promise<void> {
    this.tip = blockId;
  }

  async getDifficulty(version: BlockVersion): Promise<number> {
    const difficulty = this.versions.get(String(version));
    if (difficulty === undefined) {
      throw new UnknownVersionError(version);
    }
    return difficulty;
  }

  async acceptBlock(block: BlockRecord): Promise<string> {
    const effects = blockEffects(block, this.walletAddress);

    // Check everything before the first write so a failure changes nothing
    this.assertNotArchived(block.block_id);
    const consumed = new Set<string>();
    for (const spend of effects.spends) {
      const key = locatorKey(spend.locator);
      this.spendableOutput(spend.locator);
      if (consumed.has(key)) {
        throw new OutputUnavailableError(spend.locator);
      }
      consumed.add(key);
    }

    this.archive(block);
    for (const spend of effects.spends) {
      this.spendableOutput(spend.locator).spent_transaction_id = spend.spendingTransactionId;
      this.dropFromWallet(spend.locator);
    }
    for (const output of effects.walletOutputs) {
      this.wallet.push({ output, reserved: false });
    }
    this.tip = block.block_id;

    this.log.info(
      { blockId: block.block_id, spends: effects.spends.length, walletOutputs: effects.walletOutputs.length },
      'Block accepted into the ledger'
    );
    return block.block_id;
  }

  async getBalance(): Promise<number> {
    return fromBaseUnits(sumAmounts(this.wallet.filter(entry => !entry.reserved).map(entry => entry.output)));
  }

  async listUnspent(): Promise<UnspentOutput[]> {
    return this.wallet.filter(entry => !entry.reserved).map(entry => ({ ...entry.output }));
  }

  getStatus(): StoreStatus {
    return { backend: 'memory', connected: true, lastError: null };
  }

  private assertNotArchived(blockId: string): void {
    if (this.blocks.has(blockId)) {
      throw new InvalidBlockError(`Block ${blockId} is already archived`);
    }
  }

  private archive(block: BlockRecord): void {
    this.blocks.set(block.block_id, structuredClone(block));
    for (const transaction of Object.values(block.data)) {
      transaction.outputs.forEach((output, outputIndex) => {
        this.outputs.set(
          locatorKey({ transactionId: transaction.transaction_id, blockId: block.block_id, outputIndex }),
          { ...output, spent_transaction_id: '' }
        );
      });
    }
  }

  private spendableOutput(locator: OutputLocator): TransactionOutput {
    const output = this.outputs.get(locatorKey(locator));
    if (!output || output.spent_transaction_id) {
      throw new OutputUnavailableError(locator);
    }
    return output;
  }

  private dropFromWallet(locator: OutputLocator): void {
    const key = locatorKey(locator);
    const index = this.wallet.findIndex(entry => locatorKey(locatorOf(entry.output)) === key);
    if (index >= 0) {
      this.wallet.splice(index, 1);
    }
  }
}
