import type { Logger } from 'pino';
import type {
  BlockAcceptanceResult,
  BlockRecord,
  BlockVersion,
  LedgerStore,
  SubmissionResult,
  TransactionInput,
  TransactionRecord,
  UnspentOutput
} from '@shared/blockchain.js';
import type { MiningConfig } from '@config/app.config.js';
import { logger as rootLogger } from '@config/logger.js';
import { BlockDraft, MinedBlock } from '@ledger/block.js';
import { isValidAmount } from '@ledger/amounts.js';
import { addressOf, type WalletKeyPair } from '@ledger/keys.js';
import { FinalizedTransaction, TransactionDraft } from '@ledger/transaction.js';
import {
  parseBlockRecord,
  parseTransactionRecord,
  validateValueConservation
} from '@validation/record-validation.js';
import { BlockMiner, type MiningOutcome } from './block-miner.js';
import { BlockVerifier } from './block-verifier.js';
import { ConcurrencyManager, concurrencyManager as sharedConcurrencyManager } from './concurrency-manager.js';
import {
  DuplicateTransactionError,
  InvalidAmountError,
  InvalidBlockError,
  InvalidInputError,
  InvalidSignatureError,
  MiningInProgressError,
  TransactionRuleError,
  type LedgerError
} from './errors.js';
import { TransactionPool, inputKey } from './transaction-pool.js';
import { TransactionVerifier } from './transaction-verifier.js';

export interface LedgerServiceOptions {
  store: LedgerStore;
  keys: WalletKeyPair;
  currentVersion: BlockVersion;
  mining: MiningConfig;
  log?: Logger;
  clock?: () => Date;
  concurrency?: ConcurrencyManager;
}

type Rejection =
  | { kind: 'funding'; problem: string }
  | { kind: 'signature' }
  | { kind: 'input'; offender: TransactionInput }
  | { kind: 'duplicate' }
  | { kind: 'conflict'; offender: TransactionInput; claimedBy: string };

function describeRejection(rejection: Rejection): string {
  switch (rejection.kind) {
    case 'funding':
      return rejection.problem;
    case 'signature':
      return 'Transaction signature is invalid';
    case 'input':
      return 'Transaction uses an invalid input';
    case 'duplicate':
      return 'Transaction is already pending';
    case 'conflict':
      return `Input already claimed by pending transaction ${rejection.claimedBy}`;
  }
}

function rejectionError(transactionId: string, rejection: Rejection): LedgerError {
  switch (rejection.kind) {
    case 'funding':
      return new TransactionRuleError(transactionId, rejection.problem);
    case 'signature':
      return new InvalidSignatureError(transactionId);
    case 'input':
    case 'conflict':
      return new InvalidInputError(transactionId, rejection.offender);
    case 'duplicate':
      return new DuplicateTransactionError(transactionId);
  }
}

export interface WalletSummary {
  address: string;
  balance: number;
  unspentOutputs: UnspentOutput[];
}

/**
 * Entry point for everything that changes the ledger: paying from the node
 * wallet, admitting received transactions, mining the pending ones and
 * accepting received blocks. Mutations run one at a time through the
 * concurrency manager; the proof-of-work search runs outside that queue and
 * is cancelled when a received block moves the tip.
 */
export class LedgerService {
  readonly address: string;
  private readonly store: LedgerStore;
  private readonly keys: WalletKeyPair;
  private readonly currentVersion: BlockVersion;
  private readonly log: Logger;
  private readonly concurrency: ConcurrencyManager;
  private readonly pool = new TransactionPool();
  private readonly transactionVerifier: TransactionVerifier;
  private readonly blockVerifier: BlockVerifier;
  private readonly miner: BlockMiner;
  private miningController: AbortController | null = null;

  constructor(options: LedgerServiceOptions) {
    this.store = options.store;
    this.keys = options.keys;
    this.currentVersion = options.currentVersion;
    this.log = (options.log ?? rootLogger).child({ module: 'ledger-service' });
    this.concurrency = options.concurrency ?? sharedConcurrencyManager;
    this.address = addressOf(options.keys.publicKey);
    this.transactionVerifier = new TransactionVerifier(this.store, this.log);
    this.blockVerifier = new BlockVerifier(this.store, this.log);
    this.miner = new BlockMiner(this.store, options.mining, {
      log: this.log,
      clock: options.clock,
      commit: block => this.commitMinedBlock(block)
    });
  }

  /**
   * Pay `amount` from the node wallet to `receiverAddress` and pool the
   * signed transaction. Outputs reserved for the payment are released again
   * if any step fails.
   */
  async send(receiverAddress: string, amount: number): Promise<FinalizedTransaction> {
    return this.concurrency.queueLedgerOperation(async () => {
      const draft = new TransactionDraft(this.store);
      try {
        await draft.addOutput(this.address, receiverAddress, amount);
        const transaction = draft.finalize(this.keys);
        const rejection = await this.admit(transaction);
        if (rejection) {
          throw rejectionError(transaction.transactionId, rejection);
        }
        this.log.info({ transactionId: transaction.transactionId, receiverAddress, amount }, 'Payment created');
        return transaction;
      } catch (error) {
        await this.store.releaseOutputs(draft.reservedInputs());
        throw error;
      }
    });
  }

  /**
   * Pool an input-less transaction paying `amount` to the node wallet. Only
   * accepted while the chain is empty; mining it produces the genesis block.
   */
  async allocateGenesis(amount: number): Promise<FinalizedTransaction> {
    if (!isValidAmount(amount)) {
      throw new InvalidAmountError(amount);
    }

    return this.concurrency.queueLedgerOperation(async () => {
      const transaction = FinalizedTransaction.sign({
        inputs: [],
        outputs: [{ receiver_address: this.address, amount, spent_transaction_id: '' }]
      }, this.keys);

      const rejection = await this.admit(transaction);
      if (rejection) {
        throw new InvalidBlockError(describeRejection(rejection));
      }
      this.log.info({ transactionId: transaction.transactionId, amount }, 'Genesis allocation pooled');
      return transaction;
    });
  }

  /**
   * Admit a transaction received from elsewhere into the pending pool.
   * @param value Transaction record, validated here
   */
  async submitTransaction(value: unknown): Promise<SubmissionResult> {
    const transaction = FinalizedTransaction.fromRecord(parseTransactionRecord(value));
    return this.concurrency.queueLedgerOperation(async (): Promise<SubmissionResult> => {
      const rejection = await this.admit(transaction);
      if (!rejection) {
        return { accepted: true, transactionId: transaction.transactionId };
      }
      return {
        accepted: false,
        transactionId: transaction.transactionId,
        offender: rejection.kind === 'input' || rejection.kind === 'conflict' ? rejection.offender : null,
        error: describeRejection(rejection)
      };
    });
  }

  /**
   * Mine every pending transaction into a block on top of the current tip.
   * Only one mining attempt runs at a time.
   */
  async minePending(): Promise<MiningOutcome> {
    if (this.miningController) {
      throw new MiningInProgressError();
    }

    const controller = new AbortController();
    this.miningController = controller;
    try {
      const draft = new BlockDraft(await this.store.getTip(), this.currentVersion);
      for (const transaction of this.pool.list()) {
        draft.addTransaction(transaction);
      }

      const outcome = await this.miner.mine(draft, controller.signal);
      if (outcome.status === 'mined') {
        this.pool.remove(outcome.block.transactionIds);
      }
      return outcome;
    } finally {
      this.miningController = null;
    }
  }

  isMining(): boolean {
    return this.miningController !== null;
  }

  cancelMining(): boolean {
    if (!this.miningController) {
      return false;
    }
    this.miningController.abort();
    return true;
  }

  /**
   * Accept a block received from elsewhere. It must extend the current tip,
   * every transaction in it must verify and its proof of work must hold; an
   * accepted block stops any local mining attempt.
   * @param value Block record, validated here
   */
  async receiveBlock(value: unknown): Promise<BlockAcceptanceResult> {
    const block = MinedBlock.fromRecord(parseBlockRecord(value));

    return this.concurrency.queueLedgerOperation(async () => {
      const tip = await this.store.getTip();
      if (block.previousBlockId !== tip || await this.store.getBlock(block.blockId)) {
        return { accepted: false, blockId: block.blockId, reason: 'stale_previous_block' as const };
      }

      const transactionProblem = await this.findInvalidTransaction(block);
      if (transactionProblem) {
        this.log.warn({ blockId: block.blockId, problem: transactionProblem }, 'Block carries an invalid transaction');
        return {
          accepted: false,
          blockId: block.blockId,
          reason: 'invalid_transaction' as const,
          error: transactionProblem
        };
      }

      const verification = await this.blockVerifier.verify(block);
      if (!verification.valid) {
        return { accepted: false, blockId: block.blockId, reason: verification.reason };
      }

      if (this.cancelMining()) {
        this.log.info({ blockId: block.blockId }, 'Received block superseded the local mining attempt');
      }
      await this.dropSettledTransactions(block);
      return { accepted: true, blockId: block.blockId };
    });
  }

  async getWallet(): Promise<WalletSummary> {
    const [balance, unspentOutputs] = await Promise.all([this.store.getBalance(), this.store.listUnspent()]);
    return { address: this.address, balance, unspentOutputs };
  }

  async getTip(): Promise<string> {
    return this.store.getTip();
  }

  async getBlock(blockId: string): Promise<BlockRecord | null> {
    return this.store.getBlock(blockId);
  }

  listPending(): TransactionRecord[] {
    return this.pool.list().map(transaction => transaction.toRecord());
  }

  // Pool the transaction, or say why it was kept out
  private async admit(transaction: FinalizedTransaction): Promise<Rejection | null> {
    const problem = this.checkFunding(transaction, await this.store.getTip() === '');
    if (problem) {
      return { kind: 'funding', problem };
    }

    const verification = await this.transactionVerifier.verify(transaction);
    if (!verification.authentic) {
      return verification.offender ? { kind: 'input', offender: verification.offender } : { kind: 'signature' };
    }

    const admission = this.pool.add(transaction);
    if (!admission.admitted) {
      return admission.reason === 'duplicate'
        ? { kind: 'duplicate' }
        : { kind: 'conflict', offender: admission.offender, claimedBy: admission.claimedBy };
    }

    this.log.info({ transactionId: transaction.transactionId }, 'Transaction pooled');
    return null;
  }

  /**
   * Value rules that do not need the store: a funded transaction pays out
   * exactly what its inputs bring in; one without inputs only allocates
   * coins in the genesis block.
   */
  private checkFunding(transaction: FinalizedTransaction, genesis: boolean): string | null {
    const record = transaction.toRecord();
    if (record.inputs.length === 0) {
      return genesis ? null : 'Transactions without inputs are only allowed in the genesis block';
    }
    if (!validateValueConservation(record)) {
      return 'Transaction outputs must add up to its inputs';
    }
    return null;
  }

  private async findInvalidTransaction(block: MinedBlock): Promise<string | null> {
    const genesis = block.previousBlockId === '';
    const blockPool = new TransactionPool();

    for (const record of block.transactions()) {
      const transaction = FinalizedTransaction.fromRecord(record);
      const fundingProblem = this.checkFunding(transaction, genesis);
      if (fundingProblem) {
        return `${transaction.transactionId}: ${fundingProblem}`;
      }
      const verification = await this.transactionVerifier.verify(transaction);
      if (!verification.authentic) {
        return `${transaction.transactionId}: ${verification.offender ? 'invalid input' : 'invalid signature'}`;
      }
      const admission = blockPool.add(transaction);
      if (!admission.admitted) {
        return `${transaction.transactionId}: ${admission.reason === 'conflict' ? 'double spend within block' : 'duplicate'}`;
      }
    }
    return null;
  }

  /**
   * Drop pending transactions that can no longer be mined once `block` is the
   * tip: the ones it carries, the ones spending an output it spent and
   * genesis allocations. Wallet outputs held by a dropped payment are
   * released.
   */
  private async dropSettledTransactions(block: MinedBlock): Promise<void> {
    const spentKeys = new Set(block.transactions().flatMap(record => record.inputs.map(inputKey)));
    const settled = this.pool.list().filter(transaction =>
      block.transactionIds.includes(transaction.transactionId) ||
      transaction.inputs.length === 0 ||
      transaction.inputs.some(input => spentKeys.has(inputKey(input))));

    this.pool.remove(settled.map(transaction => transaction.transactionId));

    const orphaned = settled.filter(transaction =>
      transaction.senderAddress === this.address && !block.transactionIds.includes(transaction.transactionId));
    for (const transaction of orphaned) {
      await this.store.releaseOutputs(transaction.inputs);
    }
  }

  private async commitMinedBlock(block: MinedBlock): Promise<boolean> {
    return this.concurrency.queueLedgerOperation(async () => {
      if (await this.store.getTip() !== block.previousBlockId) {
        return false;
      }
      await this.store.acceptBlock(block.toRecord());
      return true;
    });
  }
}
