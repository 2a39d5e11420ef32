import { describe, it, expect } from 'vitest';
import { RecordValidationError } from '@services/errors.js';
import {
  parseBlockRecord,
  parseTransactionRecord,
  validateBlockRecord,
  validateTransactionRecord,
  validateValueConservation
} from '@validation/record-validation.js';
import { FIXTURE_TRANSACTION, fixtureBlock } from '../helpers/fixture-block.js';

describe('Record Validation', () => {
  describe('Transactions', () => {
    it('should accept a well-formed record', () => {
      const result = validateTransactionRecord(structuredClone(FIXTURE_TRANSACTION));

      expect(result).toEqual({ isValid: true, value: FIXTURE_TRANSACTION, errors: [] });
    });

    it('should default a missing spend marker to empty', () => {
      const record = {
        ...structuredClone(FIXTURE_TRANSACTION),
        outputs: [{ receiver_address: 'receiver-address', amount: 25 }]
      };

      expect(parseTransactionRecord(record).outputs[0].spent_transaction_id).toBe('');
    });

    it('should report every malformed field', () => {
      const result = validateTransactionRecord({
        transaction_id: '',
        unlock: { sender_public_key: 'test-public-key' },
        input_count: 2,
        inputs: [{ transaction_id: 'funding-transaction', block_id: 'funding-block', output_index: -1, amount: 0 }],
        output_count: 1,
        outputs: [{ receiver_address: 'receiver-address', amount: 'ten' }]
      });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        'transaction.transaction_id must not be empty',
        'transaction.unlock.signature must be a string',
        'transaction.inputs[0].output_index must be a non-negative integer',
        'transaction.inputs[0].amount must be a positive number',
        'transaction.outputs[0].amount must be a positive number',
        'transaction.input_count does not match the number of inputs'
      ]);
    });

    it('should reject values that are not objects', () => {
      expect(validateTransactionRecord('transaction').errors).toEqual(['transaction must be an object']);
    });

    it('should throw a validation error from the parser', () => {
      expect(() => parseTransactionRecord(null)).toThrow(RecordValidationError);
    });
  });

  describe('Blocks', () => {
    it('should accept a well-formed block', () => {
      expect(parseBlockRecord(fixtureBlock())).toEqual(fixtureBlock());
    });

    it('should accept a numeric version', () => {
      expect(parseBlockRecord({ ...fixtureBlock(), version: 2 }).version).toBe(2);
    });

    it('should require transactions to be keyed by their own id', () => {
      const block = fixtureBlock();
      const result = validateBlockRecord({ ...block, data: { 'other-key': block.data['fixture-transaction'] } });

      expect(result.errors).toEqual(['block.data.other-key is keyed by a different transaction id']);
    });

    it('should report block fields of the wrong type', () => {
      const result = validateBlockRecord({ ...fixtureBlock(), mining_proof: -1, version: null, data: [] });

      expect(result.errors).toEqual([
        'block.mining_proof must be a non-negative integer',
        'block.version must be a string or a number',
        'block.data must be an object'
      ]);
    });

    it('should name nested transaction problems by path', () => {
      const block = fixtureBlock();
      const result = validateBlockRecord({
        ...block,
        data: { 'fixture-transaction': { ...block.data['fixture-transaction'], input_count: 'one' } }
      });

      expect(result.errors).toEqual([
        'block.data.fixture-transaction.input_count must be a non-negative integer',
        'block.data.fixture-transaction.input_count does not match the number of inputs'
      ]);
    });
  });

  describe('Value conservation', () => {
    it('should hold when outputs pay out exactly the inputs', () => {
      expect(validateValueConservation(FIXTURE_TRANSACTION)).toBe(true);
    });

    it('should fail when outputs pay out more or less', () => {
      const record = structuredClone(FIXTURE_TRANSACTION);
      record.outputs[0].amount = 26;
      expect(validateValueConservation(record)).toBe(false);

      record.outputs[0].amount = 24;
      expect(validateValueConservation(record)).toBe(false);
    });
  });
});
