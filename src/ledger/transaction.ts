import type {
  LedgerStore,
  TransactionInput,
  TransactionOutput,
  TransactionRecord,
  TransactionUnlock
} from '@shared/blockchain.js';
import { InvalidAmountError, TransactionFinalizedError } from '@services/errors.js';
import { fromBaseUnits, isValidAmount, sumAmounts, toBaseUnits } from './amounts.js';
import { encodeCanonical, sha256Hex } from './canonical.js';
import { addressOf, encodeBase64, signMessage, type WalletKeyPair } from './keys.js';

const EMPTY_UNLOCK: Readonly<Record<string, never>> = Object.freeze({});

interface TransactionBody {
  inputs: readonly TransactionInput[];
  outputs: readonly TransactionOutput[];
  // Received records carry their own counts; drafts derive them
  input_count?: number;
  output_count?: number;
}

function hashedPayload(transactionId: string, body: TransactionBody) {
  return {
    transaction_id: transactionId,
    unlock: EMPTY_UNLOCK,
    input_count: body.input_count ?? body.inputs.length,
    inputs: body.inputs,
    output_count: body.output_count ?? body.outputs.length,
    outputs: body.outputs
  };
}

/**
 * Canonical bytes covered by the signature: every field except the unlock
 * portion, with the transaction id fixed.
 */
export function signingMessage(transactionId: string, body: TransactionBody): string {
  return encodeCanonical(hashedPayload(transactionId, body));
}

/** Identity hash of a transaction body: unlock left empty and no id yet. */
export function computeTransactionId(body: TransactionBody): string {
  return sha256Hex(encodeCanonical(hashedPayload('', body)));
}

/**
 * A complete, signed transaction. Either produced by finalizing a draft or
 * received as a record; it can never be modified or re-signed.
 */
export class FinalizedTransaction {
  private constructor(private readonly record: Readonly<TransactionRecord>) { }

  static fromRecord(record: TransactionRecord): FinalizedTransaction {
    return new FinalizedTransaction(cloneRecord(record));
  }

  static sign(body: TransactionBody, keys: WalletKeyPair): FinalizedTransaction {
    const transactionId = computeTransactionId(body);
    const signature = signMessage(signingMessage(transactionId, body), keys.privateKey);
    const unlock: TransactionUnlock = {
      sender_public_key: addressOf(keys.publicKey),
      signature: encodeBase64(signature)
    };
    return new FinalizedTransaction({
      transaction_id: transactionId,
      unlock,
      input_count: body.inputs.length,
      inputs: body.inputs.map(input => ({ ...input })),
      output_count: body.outputs.length,
      outputs: body.outputs.map(output => ({ ...output }))
    });
  }

  get transactionId(): string {
    return this.record.transaction_id;
  }

  get unlock(): TransactionUnlock {
    return { ...this.record.unlock };
  }

  get inputs(): TransactionInput[] {
    return this.record.inputs.map(input => ({ ...input }));
  }

  get outputs(): TransactionOutput[] {
    return this.record.outputs.map(output => ({ ...output }));
  }

  // Address of the signer (the encoded public key in the unlock portion)
  get senderAddress(): string {
    return this.record.unlock.sender_public_key;
  }

  signingMessage(): string {
    return signingMessage(this.record.transaction_id, this.record);
  }

  toRecord(): TransactionRecord {
    return cloneRecord(this.record);
  }
}

/**
 * A transaction being built. Inputs come from the ledger store as outputs are
 * added; `finalize` fixes the id and signs, after which the draft only hands
 * back the finalized transaction.
 */
export class TransactionDraft {
  private readonly inputs: TransactionInput[] = [];
  private readonly outputs: TransactionOutput[] = [];
  private finalized: FinalizedTransaction | null = null;

  constructor(private readonly store: LedgerStore) { }

  /**
   * Pay `amount` to `receiverAddress`, funding it from the store's unspent
   * outputs. Any surplus over `amount` is returned to `senderAddress` as a
   * change output.
   * @returns every output of the draft so far
   */
  async addOutput(senderAddress: string, receiverAddress: string, amount: number): Promise<TransactionOutput[]> {
    if (this.finalized) {
      throw new TransactionFinalizedError(this.finalized.transactionId);
    }
    if (!isValidAmount(amount)) {
      throw new InvalidAmountError(amount);
    }

    const selection = await this.store.getUnspentCovering(amount);
    const change = sumAmounts(selection.outputs) - toBaseUnits(amount);

    this.inputs.push(...selection.outputs.map(output => ({ ...output })));
    this.outputs.push({ receiver_address: receiverAddress, amount, spent_transaction_id: '' });
    if (change > 0n) {
      this.outputs.push({
        receiver_address: senderAddress,
        amount: fromBaseUnits(change),
        spent_transaction_id: ''
      });
    }

    return this.outputs.map(output => ({ ...output }));
  }

  /** Inputs reserved for this draft so far. */
  reservedInputs(): TransactionInput[] {
    return this.inputs.map(input => ({ ...input }));
  }

  finalize(keys: WalletKeyPair): FinalizedTransaction {
    if (!this.finalized) {
      this.finalized = FinalizedTransaction.sign({ inputs: this.inputs, outputs: this.outputs }, keys);
    }
    return this.finalized;
  }
}

function cloneRecord(record: Readonly<TransactionRecord>): TransactionRecord {
  return {
    transaction_id: record.transaction_id,
    unlock: { ...record.unlock },
    input_count: record.input_count,
    inputs: record.inputs.map(input => ({ ...input })),
    output_count: record.output_count,
    outputs: record.outputs.map(output => ({ ...output }))
  };
}
