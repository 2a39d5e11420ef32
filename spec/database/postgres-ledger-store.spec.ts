import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { PostgresLedgerStore } from '@database/postgres-ledger-store.js';
import {
  InsufficientFundsError,
  InvalidBlockError,
  OutputUnavailableError,
  StoreUnavailableError,
  UnknownVersionError
} from '@services/errors.js';
import { fixtureBlock } from '../helpers/fixture-block.js';
import { output } from '../helpers/ledger-fixtures.js';
import { ScriptedDatabase, rows, type Responder } from '../helpers/scripted-database.js';

const silent = pino({ level: 'silent' });
const WALLET = 'wallet-address';

function storeWith(respond?: Responder) {
  const db = new ScriptedDatabase(respond);
  return { db, store: new PostgresLedgerStore(db, WALLET, silent) };
}

const unspentRow = (id: number, amount: number | string) => ({
  id,
  transaction_id: `funding-${id}`,
  block_id: 'funding-block',
  output_index: 0,
  amount
});

describe('PostgresLedgerStore', () => {
  describe('Unspent output selection', () => {
    it('should lock spendable rows and reserve the ones covering the amount', async () => {
      const { db, store } = storeWith(text => (
        text.startsWith('SELECT id,') ? rows(unspentRow(1, 10), unspentRow(2, '5'), unspentRow(3, 20)) : undefined
      ));

      const selection = await store.getUnspentCovering(12);

      expect(selection).toEqual({
        total: 15,
        outputs: [
          { transaction_id: 'funding-1', block_id: 'funding-block', output_index: 0, amount: 10 },
          { transaction_id: 'funding-2', block_id: 'funding-block', output_index: 0, amount: 5 }
        ]
      });
      expect(db.statements[0].text).toContain('FOR UPDATE');
      expect(db.statements[1]).toEqual({
        text: 'UPDATE unspent_outputs SET reserved = true WHERE id = ANY($1::int[])',
        params: [[1, 2]],
        inTransaction: true
      });
      expect(db.commits).toBe(1);
    });

    it('should reserve nothing when the spendable total is short', async () => {
      const { db, store } = storeWith(text => (text.startsWith('SELECT id,') ? rows(unspentRow(1, 10)) : undefined));

      await expect(store.getUnspentCovering(11)).rejects.toThrow(InsufficientFundsError);

      expect(db.statements).toHaveLength(1);
      expect(db.rollbacks).toBe(1);
    });

    it('should release reserved outputs', async () => {
      const { db, store } = storeWith();

      await store.releaseOutputs([{ transaction_id: 'funding-1', block_id: 'funding-block', output_index: 0, amount: 10 }]);
      await store.releaseOutputs([]);

      expect(db.statements).toHaveLength(1);
      expect(db.statements[0].text.startsWith('UPDATE unspent_outputs SET reserved = false')).toBe(true);
      expect(db.statements[0].params).toEqual(['funding-1', 'funding-block', 0]);
    });

    it('should read the spendable balance', async () => {
      const { store } = storeWith(text => (text.startsWith('SELECT COALESCE') ? rows({ balance: '42.5' }) : undefined));

      expect(await store.getBalance()).toBe(42.5);
    });
  });

  describe('Spend marking', () => {
    const locator = { transactionId: 'funding-1', blockId: 'funding-block', outputIndex: 0 };

    it('should mark the output and drop it from the wallet in one transaction', async () => {
      const { db, store } = storeWith();

      await store.markSpent(locator, 'spending-transaction');

      expect(db.summary(3)).toEqual(['UPDATE transaction_outputs SET', 'DELETE FROM unspent_outputs']);
      expect(db.statements[0].params).toEqual(['spending-transaction', 'funding-1', 'funding-block', 0]);
      expect(db.statements.every(statement => statement.inTransaction)).toBe(true);
    });

    it('should fail when no unspent output matched', async () => {
      const { db, store } = storeWith(text => (text.startsWith('UPDATE transaction_outputs') ? rows() : undefined));

      await expect(store.markSpent(locator, 'spending-transaction')).rejects.toThrow(OutputUnavailableError);

      expect(db.statements).toHaveLength(1);
      expect(db.rollbacks).toBe(1);
    });

    it('should map an output row', async () => {
      const { store } = storeWith(text => (
        text.startsWith('SELECT receiver_address')
          ? rows({ receiver_address: 'receiver-address', amount: 25, spent_transaction_id: '' })
          : undefined
      ));

      expect(await store.findOutput(locator)).toEqual(output('receiver-address', 25));
    });

    it('should treat a column of the wrong type as a store failure', async () => {
      const { store } = storeWith(text => (
        text.startsWith('SELECT receiver_address')
          ? rows({ receiver_address: 7, amount: 25, spent_transaction_id: '' })
          : undefined
      ));

      await expect(store.findOutput(locator)).rejects.toThrow(StoreUnavailableError);
    });
  });

  describe('Blocks', () => {
    it('should refuse a block that is already archived', async () => {
      const { store } = storeWith(text => (text.startsWith('INSERT INTO blocks') ? rows() : undefined));

      await expect(store.appendBlock(fixtureBlock())).rejects.toThrow(InvalidBlockError);
    });

    it('should archive the block and every output', async () => {
      const { db, store } = storeWith();

      await store.appendBlock(fixtureBlock());

      expect(db.summary(3)).toEqual(['INSERT INTO blocks', 'INSERT INTO transaction_outputs']);
      expect(db.statements[1].params).toEqual(['fixture-transaction', fixtureBlock().block_id, 0, 'receiver-address', 25]);
    });

    it('should return archived blocks with spend markers applied', async () => {
      const { store } = storeWith(text => {
        if (text.startsWith('SELECT record')) {
          return rows({ record: fixtureBlock() });
        }
        if (text.startsWith('SELECT transaction_id, output_index')) {
          return rows({ transaction_id: 'fixture-transaction', output_index: 0, spent_transaction_id: 'spending-transaction' });
        }
        return undefined;
      });

      const block = await store.getBlock(fixtureBlock().block_id);

      expect(block?.data['fixture-transaction'].outputs[0].spent_transaction_id).toBe('spending-transaction');
    });

    it('should report a corrupt archived block as a store failure', async () => {
      const { store } = storeWith(text => (text.startsWith('SELECT record') ? rows({ record: { block_id: 5 } }) : undefined));

      await expect(store.getBlock('broken-block')).rejects.toThrow('Archived block broken-block is corrupt');
    });

    it('should return null for an unknown block', async () => {
      const { store } = storeWith(() => rows());

      expect(await store.getBlock('unknown-block')).toBeNull();
    });
  });

  describe('Chain state', () => {
    it('should report an empty tip before the genesis block', async () => {
      const { store } = storeWith(() => rows());

      expect(await store.getTip()).toBe('');
    });

    it('should upsert the tip', async () => {
      const { db, store } = storeWith();

      await store.setTip('tip-block');

      expect(db.statements[0].params).toEqual(['tip', 'tip-block']);
    });

    it('should look up difficulty by the text form of the version', async () => {
      const { db, store } = storeWith(text => (text.startsWith('SELECT difficulty') ? rows({ difficulty: 3 }) : undefined));

      expect(await store.getDifficulty(2)).toBe(3);
      expect(db.statements[0].params).toEqual(['2']);
    });

    it('should reject an unknown version', async () => {
      const { store } = storeWith(() => rows());

      await expect(store.getDifficulty('9.9')).rejects.toThrow(UnknownVersionError);
    });
  });

  describe('Block acceptance', () => {
    it('should archive, spend, credit the wallet and move the tip in one transaction', async () => {
      const { db, store } = storeWith();
      const block = fixtureBlock();
      block.data['fixture-transaction'].outputs.push(output(WALLET, 5));
      block.data['fixture-transaction'].output_count = 2;

      await store.acceptBlock(block);

      expect(db.summary(3)).toEqual([
        'INSERT INTO blocks',
        'INSERT INTO transaction_outputs',
        'INSERT INTO transaction_outputs',
        'UPDATE transaction_outputs SET',
        'DELETE FROM unspent_outputs',
        'INSERT INTO unspent_outputs',
        'INSERT INTO chain_state'
      ]);
      expect(db.statements[5].params).toEqual(['fixture-transaction', block.block_id, 1, 5]);
      expect(db.statements[6].params).toEqual(['tip', block.block_id]);
      expect(db.statements.every(statement => statement.inTransaction)).toBe(true);
      expect(db.commits).toBe(1);
    });

    it('should roll back when an input is already spent', async () => {
      const { db, store } = storeWith(text => (text.startsWith('UPDATE transaction_outputs') ? rows() : undefined));

      await expect(store.acceptBlock(fixtureBlock())).rejects.toThrow(OutputUnavailableError);

      expect(db.rollbacks).toBe(1);
      expect(db.summary(3)).not.toContain('INSERT INTO chain_state');
    });

    it('should report the database status', () => {
      const { store } = storeWith();

      expect(store.getStatus()).toEqual({ backend: 'postgres', connected: true, lastError: null });
    });
  });
});
