import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import type { TransactionInput } from '@shared/blockchain.js';
import { MemoryLedgerStore } from '@database/memory-ledger-store.js';
import { sumAmounts } from '@ledger/amounts.js';
import { MiningPayload } from '@ledger/block.js';
import { addressOf, generateKeyPair, type WalletKeyPair } from '@ledger/keys.js';
import { FinalizedTransaction } from '@ledger/transaction.js';
import { ConcurrencyManager } from '@services/concurrency-manager.js';
import {
  DuplicateTransactionError,
  InsufficientFundsError,
  InvalidAmountError,
  InvalidBlockError,
  MiningInProgressError,
  RecordValidationError,
  TransactionRuleError
} from '@services/errors.js';
import { LedgerService } from '@services/ledger-service.js';
import { mineRemoteBlock, output } from '../helpers/ledger-fixtures.js';

const silent = pino({ level: 'silent' });
const minedAt = new Date(2024, 0, 2, 3, 4, 5);

// Difficulty 64 is never met, so mining at version 2.0 runs until cancelled
const VERSIONS = { '1.0': 1, '2.0': 64 };

function createStore(keys: WalletKeyPair) {
  return new MemoryLedgerStore({ walletAddress: addressOf(keys.publicKey), versions: VERSIONS, log: silent });
}

function createService(keys: WalletKeyPair, currentVersion = '1.0', store = createStore(keys)) {
  return new LedgerService({
    store,
    keys,
    currentVersion,
    mining: { maxNonce: null, checkInterval: 10 },
    log: silent,
    clock: () => minedAt,
    concurrency: new ConcurrencyManager()
  });
}

const remoteBlock = (previousBlockId: string, transactions: FinalizedTransaction[]) =>
  mineRemoteBlock(previousBlockId, transactions, minedAt);

describe('LedgerService', () => {
  let keys: WalletKeyPair;
  let store: MemoryLedgerStore;
  let service: LedgerService;

  beforeEach(() => {
    keys = generateKeyPair();
    store = createStore(keys);
    service = createService(keys, '1.0', store);
  });

  // Mine a genesis block paying `amount` to the node wallet
  async function mineGenesis(amount: number): Promise<{ blockId: string; funding: TransactionInput }> {
    const allocation = await service.allocateGenesis(amount);
    const outcome = await service.minePending();
    if (outcome.status !== 'mined') {
      throw new Error(`genesis mining ended with ${outcome.status}`);
    }
    return {
      blockId: outcome.block.blockId,
      funding: { transaction_id: allocation.transactionId, block_id: outcome.block.blockId, output_index: 0, amount }
    };
  }

  describe('Genesis allocation', () => {
    it('should mine pending allocations into the first block', async () => {
      const allocation = await service.allocateGenesis(50);
      expect(service.listPending()).toEqual([allocation.toRecord()]);

      const outcome = await service.minePending();

      expect(outcome.status).toBe('mined');
      const block = outcome.status === 'mined' ? outcome.block.toRecord() : null;
      expect(block?.previous_block_id).toBe('');
      expect(block?.timestamp).toBe('2024-01-02 03:04:05');
      expect(Object.keys(block?.data ?? {})).toEqual([allocation.transactionId]);
      expect(await service.getTip()).toBe(block?.block_id);
      expect(service.listPending()).toEqual([]);
      expect(await service.getWallet()).toEqual({
        address: service.address,
        balance: 50,
        unspentOutputs: [{ transaction_id: allocation.transactionId, block_id: block?.block_id, output_index: 0, amount: 50 }]
      });
    });

    it('should refuse allocations once the chain has a block', async () => {
      await mineGenesis(50);

      await expect(service.allocateGenesis(10))
        .rejects.toThrow(new InvalidBlockError('Transactions without inputs are only allowed in the genesis block'));
    });

    it('should refuse amounts that are not positive', async () => {
      await expect(service.allocateGenesis(0)).rejects.toThrow(InvalidAmountError);
    });
  });

  describe('Payments', () => {
    it('should pool a signed payment with change and settle it when mined', async () => {
      await mineGenesis(50);

      const payment = await service.send('receiver-address', 20);

      expect(payment.outputs).toEqual([output('receiver-address', 20), output(service.address, 30)]);
      expect(service.listPending()).toEqual([payment.toRecord()]);
      expect((await service.getWallet()).balance).toBe(0);

      const outcome = await service.minePending();

      expect(outcome.status).toBe('mined');
      const blockId = outcome.status === 'mined' ? outcome.block.blockId : '';
      expect(await service.getWallet()).toEqual({
        address: service.address,
        balance: 30,
        unspentOutputs: [{ transaction_id: payment.transactionId, block_id: blockId, output_index: 1, amount: 30 }]
      });
      expect(service.listPending()).toEqual([]);
    });

    it('should leave the wallet unchanged when funds are insufficient', async () => {
      await mineGenesis(50);

      await expect(service.send('receiver-address', 60)).rejects.toThrow(InsufficientFundsError);

      expect((await service.getWallet()).balance).toBe(50);
      expect(service.listPending()).toEqual([]);
    });

    it('should not fund a payment from outputs reserved by a pending one', async () => {
      await mineGenesis(50);

      await service.send('receiver-address', 20);

      await expect(service.send('receiver-address', 5)).rejects.toThrow('Insufficient funds: 0 available < 5 requested');
    });

    it('should pay fractional amounts with outputs that add up to the inputs', async () => {
      await service.allocateGenesis(0.1);
      await service.allocateGenesis(0.7);
      await service.minePending();

      const payment = await service.send('receiver-address', 0.2);
      const record = payment.toRecord();

      expect(record.outputs[0]).toEqual(output('receiver-address', 0.2));
      expect(sumAmounts(record.outputs)).toBe(sumAmounts(record.inputs));
      expect(service.listPending()).toEqual([record]);

      await service.minePending();

      expect((await service.getWallet()).balance).toBe(0.6);
    });

    it('should refuse amounts with more than eight decimals', async () => {
      await mineGenesis(50);

      await expect(service.send('receiver-address', 0.000000001)).rejects.toThrow(InvalidAmountError);
    });

    it('should report a payment breaking the funding rules as a rule violation', async () => {
      await mineGenesis(50);
      vi.spyOn(store, 'getUnspentCovering').mockResolvedValue({ total: 0, outputs: [] });

      const failure = service.send('receiver-address', 20);

      await expect(failure).rejects.toThrow(TransactionRuleError);
      await expect(failure).rejects.toThrow('Transactions without inputs are only allowed in the genesis block');
      expect(service.listPending()).toEqual([]);
    });

    it('should report a payment identical to a pending one as a duplicate', async () => {
      const { funding } = await mineGenesis(50);
      vi.spyOn(store, 'getUnspentCovering').mockResolvedValue({ total: 50, outputs: [funding] });

      const first = await service.send('receiver-address', 20);

      await expect(service.send('receiver-address', 20)).rejects.toThrow(new DuplicateTransactionError(first.transactionId));
      expect(service.listPending()).toEqual([first.toRecord()]);
    });
  });

  describe('Submitted transactions', () => {
    it('should admit a valid transaction and refuse a second claim on its input', async () => {
      const { funding } = await mineGenesis(50);
      const first = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('first-receiver', 50)] }, keys);
      const second = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('second-receiver', 50)] }, keys);

      expect(await service.submitTransaction(first.toRecord())).toEqual({ accepted: true, transactionId: first.transactionId });
      expect(await service.submitTransaction(second.toRecord())).toEqual({
        accepted: false,
        transactionId: second.transactionId,
        offender: funding,
        error: `Input already claimed by pending transaction ${first.transactionId}`
      });
      expect(await service.submitTransaction(first.toRecord())).toEqual({
        accepted: false,
        transactionId: first.transactionId,
        offender: null,
        error: 'Transaction is already pending'
      });
    });

    it('should refuse a transaction whose signature does not cover its contents', async () => {
      const { funding } = await mineGenesis(50);
      const record = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('first-receiver', 50)] }, keys).toRecord();
      record.outputs[0].receiver_address = 'attacker-address';

      expect(await service.submitTransaction(record)).toEqual({
        accepted: false,
        transactionId: record.transaction_id,
        offender: null,
        error: 'Transaction signature is invalid'
      });
    });

    it('should refuse a transaction paying out more than it spends', async () => {
      const { funding } = await mineGenesis(50);
      const transaction = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('receiver-address', 60)] }, keys);

      expect(await service.submitTransaction(transaction.toRecord())).toEqual({
        accepted: false,
        transactionId: transaction.transactionId,
        offender: null,
        error: 'Transaction outputs must add up to its inputs'
      });
    });

    it('should name the input another wallet tried to spend', async () => {
      const { funding } = await mineGenesis(50);
      const intruder = generateKeyPair();
      const theft = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('intruder-address', 50)] }, intruder);

      expect(await service.submitTransaction(theft.toRecord())).toEqual({
        accepted: false,
        transactionId: theft.transactionId,
        offender: funding,
        error: 'Transaction uses an invalid input'
      });
    });

    it('should reject malformed records', async () => {
      await expect(service.submitTransaction({ transaction_id: 'broken' })).rejects.toThrow(RecordValidationError);
    });
  });

  describe('Mining', () => {
    it('should allow one mining attempt at a time', async () => {
      await service.allocateGenesis(50);

      const first = service.minePending();
      await expect(service.minePending()).rejects.toThrow(MiningInProgressError);

      expect((await first).status).toBe('mined');
      expect(service.isMining()).toBe(false);
    });

    it('should stop mining on request', async () => {
      const slowService = createService(keys, '2.0');

      const mining = slowService.minePending();
      expect(slowService.isMining()).toBe(true);
      expect(slowService.cancelMining()).toBe(true);

      expect(await mining).toEqual({ status: 'cancelled', attempts: 0 });
      expect(slowService.cancelMining()).toBe(false);
    });
  });

  describe('Received blocks', () => {
    it('should accept a block extending the tip and drop pending payments it settled', async () => {
      const { blockId, funding } = await mineGenesis(50);
      await service.send('receiver-address', 20);
      const spend = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('remote-receiver', 50)] }, keys);
      const block = await remoteBlock(blockId, [spend]);

      const result = await service.receiveBlock(block);

      expect(result).toEqual({ accepted: true, blockId: block.block_id });
      expect(await service.getTip()).toBe(block.block_id);
      expect(service.listPending()).toEqual([]);
      expect(await service.getWallet()).toEqual({ address: service.address, balance: 0, unspentOutputs: [] });
      expect((await service.getBlock(blockId))?.data[funding.transaction_id].outputs[0].spent_transaction_id)
        .toBe(spend.transactionId);
    });

    it('should accept a remote genesis block and stop the local attempt', async () => {
      const slowService = createService(keys, '2.0');
      const remoteKeys = generateKeyPair();
      const allocation = FinalizedTransaction.sign({ inputs: [], outputs: [output(addressOf(remoteKeys.publicKey), 10)] }, remoteKeys);
      const block = await remoteBlock('', [allocation]);

      const mining = slowService.minePending();
      const result = await slowService.receiveBlock(block);

      expect(result).toEqual({ accepted: true, blockId: block.block_id });
      expect((await mining).status).toBe('cancelled');
      expect(await slowService.getTip()).toBe(block.block_id);
    });

    it('should refuse a block that does not extend the tip', async () => {
      const { blockId } = await mineGenesis(50);
      const block = await remoteBlock('', []);

      expect(await service.receiveBlock(block)).toEqual({
        accepted: false,
        blockId: block.block_id,
        reason: 'stale_previous_block'
      });
      expect(await service.getTip()).toBe(blockId);
    });

    it('should refuse a block spending an output that does not exist', async () => {
      const { blockId } = await mineGenesis(50);
      const missing = { transaction_id: 'unknown-transaction', block_id: blockId, output_index: 0, amount: 5 };
      const spend = FinalizedTransaction.sign({ inputs: [missing], outputs: [output('remote-receiver', 5)] }, keys);
      const block = await remoteBlock(blockId, [spend]);

      expect(await service.receiveBlock(block)).toEqual({
        accepted: false,
        blockId: block.block_id,
        reason: 'invalid_transaction',
        error: `${spend.transactionId}: invalid input`
      });
      expect(await service.getTip()).toBe(blockId);
    });

    it('should refuse a block spending one output twice', async () => {
      const { blockId, funding } = await mineGenesis(50);
      const first = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('first-receiver', 50)] }, keys);
      const second = FinalizedTransaction.sign({ inputs: [funding], outputs: [output('second-receiver', 50)] }, keys);
      const block = await remoteBlock(blockId, [first, second]);

      expect(await service.receiveBlock(block)).toEqual({
        accepted: false,
        blockId: block.block_id,
        reason: 'invalid_transaction',
        error: `${second.transactionId}: double spend within block`
      });
    });

    it('should refuse an allocation outside the genesis block', async () => {
      const { blockId } = await mineGenesis(50);
      const allocation = FinalizedTransaction.sign({ inputs: [], outputs: [output('remote-receiver', 10)] }, keys);
      const block = await remoteBlock(blockId, [allocation]);

      expect(await service.receiveBlock(block)).toEqual({
        accepted: false,
        blockId: block.block_id,
        reason: 'invalid_transaction',
        error: `${allocation.transactionId}: Transactions without inputs are only allowed in the genesis block`
      });
    });

    it('should refuse a block whose proof misses the difficulty', async () => {
      const { blockId } = await mineGenesis(50);
      const payload = new MiningPayload(blockId, {}, '1.0');
      let nonce = 0;
      while (payload.hashWithNonce(nonce).startsWith('0')) {
        nonce++;
      }

      const result = await service.receiveBlock({
        block_id: payload.blockId(),
        previous_block_id: blockId,
        timestamp: '2024-01-02 03:04:05',
        data: {},
        version: '1.0',
        mining_proof: nonce
      });

      expect(result).toEqual({ accepted: false, blockId: payload.blockId(), reason: 'difficulty_not_met' });
      expect(await service.getTip()).toBe(blockId);
    });

    it('should refuse a block of an unknown version', async () => {
      const { blockId } = await mineGenesis(50);
      const payload = new MiningPayload(blockId, {}, '9.9');

      const result = await service.receiveBlock({
        block_id: payload.blockId(),
        previous_block_id: blockId,
        timestamp: '2024-01-02 03:04:05',
        data: {},
        version: '9.9',
        mining_proof: 0
      });

      expect(result).toEqual({ accepted: false, blockId: payload.blockId(), reason: 'unknown_version' });
      expect(await service.getTip()).toBe(blockId);
    });

    it('should refuse a block it already holds', async () => {
      const { blockId } = await mineGenesis(50);
      const genesis = await service.getBlock(blockId);

      expect((await service.receiveBlock(genesis))).toEqual({
        accepted: false,
        blockId,
        reason: 'stale_previous_block'
      });
    });
  });
});
