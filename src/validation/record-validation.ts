import type {
  BlockRecord,
  TransactionInput,
  TransactionOutput,
  TransactionRecord
} from '@shared/blockchain.js';
import { AMOUNT_DECIMALS, MAX_AMOUNT, isValidAmount, sumAmounts } from '@ledger/amounts.js';
import { RecordValidationError } from '@services/errors.js';

export type ValidationResult<T> =
  | { isValid: true; value: T; errors: [] }
  | { isValid: false; errors: string[] };

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(fields: Fields, key: string, path: string, errors: string[]): string {
  const value = fields[key];
  if (typeof value !== 'string') {
    errors.push(`${path}.${key} must be a string`);
    return '';
  }
  return value;
}

function readCount(fields: Fields, key: string, path: string, errors: string[]): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    errors.push(`${path}.${key} must be a non-negative integer`);
    return 0;
  }
  return value;
}

function readAmount(fields: Fields, key: string, path: string, errors: string[]): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    errors.push(`${path}.${key} must be a positive number`);
    return 0;
  }
  if (!isValidAmount(value)) {
    errors.push(`${path}.${key} must have at most ${AMOUNT_DECIMALS} decimals and not exceed ${MAX_AMOUNT}`);
    return 0;
  }
  return value;
}

function readInput(value: unknown, path: string, errors: string[]): TransactionInput {
  if (!isFields(value)) {
    errors.push(`${path} must be an object`);
    return { transaction_id: '', block_id: '', output_index: 0, amount: 0 };
  }
  return {
    transaction_id: readString(value, 'transaction_id', path, errors),
    block_id: readString(value, 'block_id', path, errors),
    output_index: readCount(value, 'output_index', path, errors),
    amount: readAmount(value, 'amount', path, errors)
  };
}

function readOutput(value: unknown, path: string, errors: string[]): TransactionOutput {
  if (!isFields(value)) {
    errors.push(`${path} must be an object`);
    return { receiver_address: '', amount: 0, spent_transaction_id: '' };
  }
  const spent = value.spent_transaction_id;
  if (spent !== undefined && spent !== null && typeof spent !== 'string') {
    errors.push(`${path}.spent_transaction_id must be a string`);
  }
  const receiver = readString(value, 'receiver_address', path, errors);
  if (receiver === '' && typeof value.receiver_address === 'string') {
    errors.push(`${path}.receiver_address must not be empty`);
  }
  return {
    receiver_address: receiver,
    amount: readAmount(value, 'amount', path, errors),
    spent_transaction_id: typeof spent === 'string' ? spent : ''
  };
}

function readList<T>(fields: Fields, key: string, path: string, errors: string[], read: (item: unknown, itemPath: string) => T): T[] {
  const value = fields[key];
  if (!Array.isArray(value)) {
    errors.push(`${path}.${key} must be an array`);
    return [];
  }
  return value.map((item: unknown, index) => read(item, `${path}.${key}[${index}]`));
}

function readTransaction(value: unknown, path: string, errors: string[]): TransactionRecord {
  if (!isFields(value)) {
    errors.push(`${path} must be an object`);
    return {
      transaction_id: '',
      unlock: { sender_public_key: '', signature: '' },
      input_count: 0,
      inputs: [],
      output_count: 0,
      outputs: []
    };
  }

  const transactionId = readString(value, 'transaction_id', path, errors);
  if (transactionId === '' && typeof value.transaction_id === 'string') {
    errors.push(`${path}.transaction_id must not be empty`);
  }

  const unlock = value.unlock;
  let senderPublicKey = '';
  let signature = '';
  if (isFields(unlock)) {
    senderPublicKey = readString(unlock, 'sender_public_key', `${path}.unlock`, errors);
    signature = readString(unlock, 'signature', `${path}.unlock`, errors);
  } else {
    errors.push(`${path}.unlock must be an object`);
  }

  const inputs = readList(value, 'inputs', path, errors, (item, itemPath) => readInput(item, itemPath, errors));
  const outputs = readList(value, 'outputs', path, errors, (item, itemPath) => readOutput(item, itemPath, errors));
  const inputCount = readCount(value, 'input_count', path, errors);
  const outputCount = readCount(value, 'output_count', path, errors);

  if (Array.isArray(value.inputs) && inputCount !== inputs.length) {
    errors.push(`${path}.input_count does not match the number of inputs`);
  }
  if (Array.isArray(value.outputs) && outputCount !== outputs.length) {
    errors.push(`${path}.output_count does not match the number of outputs`);
  }

  return {
    transaction_id: transactionId,
    unlock: { sender_public_key: senderPublicKey, signature },
    input_count: inputCount,
    inputs,
    output_count: outputCount,
    outputs
  };
}

/**
 * Validate the shape of a transaction record received from outside the
 * process. Signatures and input ownership are checked by the verifier.
 */
export function validateTransactionRecord(value: unknown): ValidationResult<TransactionRecord> {
  const errors: string[] = [];
  const record = readTransaction(value, 'transaction', errors);
  return errors.length === 0 ? { isValid: true, value: record, errors: [] } : { isValid: false, errors };
}

/**
 * Validate the shape of a block record. Every transaction is keyed by its own id.
 */
export function validateBlockRecord(value: unknown): ValidationResult<BlockRecord> {
  const errors: string[] = [];
  if (!isFields(value)) {
    return { isValid: false, errors: ['block must be an object'] };
  }

  const blockId = readString(value, 'block_id', 'block', errors);
  const previousBlockId = readString(value, 'previous_block_id', 'block', errors);
  const timestamp = readString(value, 'timestamp', 'block', errors);
  const miningProof = readCount(value, 'mining_proof', 'block', errors);

  const version = value.version;
  if (typeof version !== 'string' && typeof version !== 'number') {
    errors.push('block.version must be a string or a number');
  }

  const data: Record<string, TransactionRecord> = {};
  if (isFields(value.data)) {
    for (const [key, entry] of Object.entries(value.data)) {
      const transaction = readTransaction(entry, `block.data.${key}`, errors);
      if (isFields(entry) && transaction.transaction_id !== key) {
        errors.push(`block.data.${key} is keyed by a different transaction id`);
      }
      data[key] = transaction;
    }
  } else {
    errors.push('block.data must be an object');
  }

  if (errors.length > 0 || (typeof version !== 'string' && typeof version !== 'number')) {
    return { isValid: false, errors };
  }

  return {
    isValid: true,
    value: {
      block_id: blockId,
      previous_block_id: previousBlockId,
      timestamp,
      data,
      version,
      mining_proof: miningProof
    },
    errors: []
  };
}

export function parseTransactionRecord(value: unknown): TransactionRecord {
  const result = validateTransactionRecord(value);
  if (!result.isValid) {
    throw new RecordValidationError(result.errors);
  }
  return result.value;
}

export function parseBlockRecord(value: unknown): BlockRecord {
  const result = validateBlockRecord(value);
  if (!result.isValid) {
    throw new RecordValidationError(result.errors);
  }
  return result.value;
}

/**
 * Value conservation: every unit an input brings in is paid out again.
 */
export function validateValueConservation(record: TransactionRecord): boolean {
  return sumAmounts(record.inputs) === sumAmounts(record.outputs);
}
