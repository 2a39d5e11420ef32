import type { BlockRecord, BlockVersion, TransactionRecord } from '@shared/blockchain.js';
import { encodeCanonical, sha256Hex } from './canonical.js';
import type { FinalizedTransaction } from './transaction.js';

/**
 * Fields fixed before a proof-of-work search begins. The transactions must
 * not change while a block is mined, so the ordered encoding of the data is
 * computed once per payload.
 */
export class MiningPayload {
  private encoded: string | null = null;

  constructor(
    readonly previousBlockId: string,
    private readonly data: Readonly<Record<string, TransactionRecord>>,
    readonly version: BlockVersion
  ) { }

  /** `previous_block_id || canonical(data) || version` */
  toString(): string {
    if (this.encoded === null) {
      this.encoded = `${this.previousBlockId}${encodeCanonical(this.data)}${String(this.version)}`;
    }
    return this.encoded;
  }

  /** The block's permanent identity: the payload hashed without a nonce. */
  blockId(): string {
    return sha256Hex(this.toString());
  }

  hashWithNonce(nonce: number): string {
    return sha256Hex(`${this.toString()}${nonce}`);
  }
}

export function difficultyTarget(difficulty: number): string {
  if (!Number.isSafeInteger(difficulty) || difficulty < 0) {
    throw new RangeError(`Difficulty must be a non-negative integer, got ${difficulty}`);
  }
  return '0'.repeat(difficulty);
}

export function meetsDifficulty(hash: string, difficulty: number): boolean {
  return hash.startsWith(difficultyTarget(difficulty));
}

/** `YYYY-MM-DD HH:MM:SS` in local time */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function cloneData(data: Readonly<Record<string, TransactionRecord>>): Record<string, TransactionRecord> {
  return structuredClone({ ...data });
}

/**
 * A mined (or received) block. Immutable: its id, nonce and timestamp are
 * fixed.
 */
export class MinedBlock {
  private readonly payload: MiningPayload;

  private constructor(private readonly record: Readonly<BlockRecord>) {
    this.payload = new MiningPayload(record.previous_block_id, record.data, record.version);
  }

  static fromRecord(record: BlockRecord): MinedBlock {
    return new MinedBlock({ ...record, data: cloneData(record.data) });
  }

  static fromSearch(payload: MiningPayload, data: Readonly<Record<string, TransactionRecord>>, miningProof: number, minedAt: Date): MinedBlock {
    return new MinedBlock({
      block_id: payload.blockId(),
      previous_block_id: payload.previousBlockId,
      timestamp: formatTimestamp(minedAt),
      data: cloneData(data),
      version: payload.version,
      mining_proof: miningProof
    });
  }

  get blockId(): string {
    return this.record.block_id;
  }

  get previousBlockId(): string {
    return this.record.previous_block_id;
  }

  get version(): BlockVersion {
    return this.record.version;
  }

  get miningProof(): number {
    return this.record.mining_proof;
  }

  get transactionIds(): string[] {
    return Object.keys(this.record.data);
  }

  transactions(): TransactionRecord[] {
    return Object.values(cloneData(this.record.data));
  }

  miningPayload(): MiningPayload {
    return this.payload;
  }

  toRecord(): BlockRecord {
    return { ...this.record, data: cloneData(this.record.data) };
  }
}

/**
 * A block being assembled from finalized transactions. Mining turns it into a
 * `MinedBlock`; once that happened the draft keeps returning the same block.
 */
export class BlockDraft {
  private readonly data: Record<string, TransactionRecord> = {};
  private payload: MiningPayload | null = null;
  private mined: MinedBlock | null = null;

  constructor(readonly previousBlockId: string, readonly version: BlockVersion) { }

  addTransaction(transaction: FinalizedTransaction): Record<string, TransactionRecord> {
    if (this.payload) {
      throw new Error('Cannot add transactions to a block once mining has started');
    }
    const record = transaction.toRecord();
    this.data[record.transaction_id] = record;
    return { [record.transaction_id]: transaction.toRecord() };
  }

  get transactionCount(): number {
    return Object.keys(this.data).length;
  }

  /** Freezes the block contents and returns the payload to search over. */
  miningPayload(): MiningPayload {
    if (!this.payload) {
      this.payload = new MiningPayload(this.previousBlockId, cloneData(this.data), this.version);
    }
    return this.payload;
  }

  getMined(): MinedBlock | null {
    return this.mined;
  }

  complete(miningProof: number, minedAt: Date): MinedBlock {
    if (!this.mined) {
      this.mined = MinedBlock.fromSearch(this.miningPayload(), this.data, miningProof, minedAt);
    }
    return this.mined;
  }
}
