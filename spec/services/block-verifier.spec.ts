import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { MemoryLedgerStore } from '@database/memory-ledger-store.js';
import { BlockDraft, MinedBlock } from '@ledger/block.js';
import { searchProof } from '@ledger/proof-of-work.js';
import { FinalizedTransaction } from '@ledger/transaction.js';
import { BlockVerifier } from '@services/block-verifier.js';
import {
  FIXTURE_HASH_DIFFICULTY_5,
  FIXTURE_PROOF_DIFFICULTY_5,
  fixtureBlock
} from '../helpers/fixture-block.js';
import { fundedLedger, output } from '../helpers/ledger-fixtures.js';

const silent = pino({ level: 'silent' });

describe('BlockVerifier', () => {
  const difficultyFiveStore = () =>
    new MemoryLedgerStore({ walletAddress: 'wallet-address', versions: { '1.0': 5 }, log: silent });

  describe('Proof of work', () => {
    it('should accept the proof recorded in a block', async () => {
      const verifier = new BlockVerifier(difficultyFiveStore(), silent);

      const result = await verifier.check(MinedBlock.fromRecord(fixtureBlock()));

      expect(result).toEqual({ valid: true, hash: FIXTURE_HASH_DIFFICULTY_5 });
    });

    it('should reject a proof that misses the difficulty', async () => {
      const verifier = new BlockVerifier(difficultyFiveStore(), silent);

      const result = await verifier.check(MinedBlock.fromRecord(fixtureBlock(FIXTURE_PROOF_DIFFICULTY_5 - 1)));

      expect(result).toEqual({
        valid: false,
        reason: 'difficulty_not_met',
        hash: '1551d933bc1f7da90433569dc5c4ab049efe784e6f3114c292d02a1fc47ffad4'
      });
    });

    it('should reject a block whose id is not the hash of its payload', async () => {
      const verifier = new BlockVerifier(difficultyFiveStore(), silent);
      const record = { ...fixtureBlock(), block_id: 'f'.repeat(64) };

      const result = await verifier.check(MinedBlock.fromRecord(record));

      expect(result).toEqual({ valid: false, reason: 'block_id_mismatch', hash: FIXTURE_HASH_DIFFICULTY_5 });
    });

    it('should reject a block whose version has no difficulty', async () => {
      const store = new MemoryLedgerStore({ walletAddress: 'wallet-address', versions: { '2.0': 5 }, log: silent });
      const verifier = new BlockVerifier(store, silent);

      const result = await verifier.verify(MinedBlock.fromRecord(fixtureBlock()));

      expect(result).toEqual({ valid: false, reason: 'unknown_version', hash: FIXTURE_HASH_DIFFICULTY_5 });
      expect(await store.getTip()).toBe('');
    });

    it('should reject a block whose data changed after mining', async () => {
      const verifier = new BlockVerifier(difficultyFiveStore(), silent);
      const record = fixtureBlock();
      record.data['fixture-transaction'].outputs[0].amount = 26;

      const result = await verifier.check(MinedBlock.fromRecord(record));

      expect(result.valid).toBe(false);
    });
  });

  describe('Acceptance', () => {
    it('should leave the ledger untouched when the block is rejected', async () => {
      const store = difficultyFiveStore();
      const verifier = new BlockVerifier(store, silent);

      const result = await verifier.verify(MinedBlock.fromRecord(fixtureBlock(0)));

      expect(result.reason).toBe('difficulty_not_met');
      expect(await store.getTip()).toBe('');
      expect(await store.getBlock(fixtureBlock().block_id)).toBeNull();
    });

    it('should make a valid block the new tip and spend its inputs', async () => {
      const ledger = await fundedLedger([10]);
      const input = {
        transaction_id: ledger.allocation.transaction_id,
        block_id: ledger.genesis.block_id,
        output_index: 0,
        amount: 10
      };
      const payment = FinalizedTransaction.sign({ inputs: [input], outputs: [output('receiver-address', 10)] }, ledger.keys);
      const draft = new BlockDraft(ledger.genesis.block_id, '1.0');
      draft.addTransaction(payment);
      const proof = await searchProof(draft.miningPayload(), 1);
      if (proof.status !== 'found') {
        throw new Error('expected a proof');
      }
      const block = draft.complete(proof.nonce, new Date(2024, 0, 2, 3, 4, 5));

      const result = await new BlockVerifier(ledger.store, silent).verify(block);

      expect(result).toEqual({ valid: true, hash: proof.hash });
      expect(await ledger.store.getTip()).toBe(block.blockId);
      expect(await ledger.store.findOutput({
        transactionId: input.transaction_id,
        blockId: input.block_id,
        outputIndex: 0
      })).toEqual({ receiver_address: ledger.address, amount: 10, spent_transaction_id: payment.transactionId });
      expect(await ledger.store.getBalance()).toBe(0);
    });
  });
});
